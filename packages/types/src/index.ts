export interface Route {
  id: string;
  flight_id: string | null;
  origin: string;
  destination: string;
  departure_date: string;
  arrival_date: string;
  capacity: number;
  description: string | null;
  created_at: string;
}

export interface RouteListMeta {
  total: number;
  offset: number;
  limit: number;
}

export interface ApiResponse<T, M = Record<string, unknown>> {
  data: T;
  meta?: M;
}

export interface ApiErrorDetail {
  field: string;
  message: string;
}

export interface ApiError {
  error: string;
  details?: ApiErrorDetail[];
}
