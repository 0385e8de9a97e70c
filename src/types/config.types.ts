export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface Config {
  server: {
    port: number;
    nodeEnv: 'development' | 'production' | 'test';
  };
  webhook: {
    secret: string;
    signatureHeader: string;
    maxBodyBytes: number;
  };
  wallet: {
    /** Minor units credited to a player on first authentication. */
    startingBalance: number;
    defaultCurrency: string;
  };
  logging: {
    level: LogLevel;
  };
}
