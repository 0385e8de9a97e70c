import { Request, Response, NextFunction, RequestHandler } from 'express';

declare global {
  namespace Express {
    interface Request {
      rawBody?: Buffer;
    }
  }
}

// Keeps the exact request bytes; signatures are computed over them, not over re-serialized JSON.
export function rawBodyMiddleware(maxBytes: number): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const chunks: Buffer[] = [];
    let received = 0;
    let rejected = false;

    req.on('data', (chunk: Buffer) => {
      if (rejected) return;
      received += chunk.length;
      if (received > maxBytes) {
        rejected = true;
        res.status(413).json({
          status: 'error',
          error_code: 'PAYLOAD_TOO_LARGE',
          error_message: `Request body exceeds ${maxBytes} bytes`,
        });
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (rejected) return;
      req.rawBody = Buffer.concat(chunks);
      next();
    });

    req.on('error', (error) => {
      if (rejected) return;
      rejected = true;
      next(error);
    });
  };
}
