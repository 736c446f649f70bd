export interface CustomerInput {
  name: string;
  address: string;
  email: string;
  phone_number: string;
  member_since: string; // YYYY-MM-DD
  status: string;
}

export interface Customer extends CustomerInput {
  id: number;
}

// Every writable column doubles as a list filter
export type CustomerFilter = keyof CustomerInput;

export interface ServiceInfo {
  name: string;
  version: string;
  paths: string;
}

export interface HealthStatus {
  status: number;
  message: string;
}

export interface ErrorBody {
  error: string;
  message?: string;
  issues?: Record<string, unknown>;
}
