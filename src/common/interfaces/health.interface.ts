export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  service: string;
}

export interface ApiInfoResponse {
  message: string;
  version: string;
  endpoints: Record<string, string>;
}
