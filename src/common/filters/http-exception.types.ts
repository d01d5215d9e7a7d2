export interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  code?: string;
  seats?: string[];
  timestamp: string;
  path: string;
  method: string;
  correlationId?: string;
}
