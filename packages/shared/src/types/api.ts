export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
}

export interface MessageResponse {
  message: string;
}
