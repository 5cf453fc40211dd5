export interface IncrementVisitResponse {
  message: string;
}

export interface VisitCountResponse {
  visits: number;
}

export interface ErrorResponse {
  error: string;
}
