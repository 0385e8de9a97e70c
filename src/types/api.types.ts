export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  services: {
    wallet: {
      status: 'up' | 'down';
      accounts?: number;
    };
  };
}

export interface ErrorResponse {
  error: string;
  message: string;
}
