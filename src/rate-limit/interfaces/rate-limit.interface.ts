export interface WindowSpec {
  label: string;
  limit: number;
  windowMs: number;
}

export interface WindowUsage extends WindowSpec {
  used: number;
}

export interface RateLimitStatus {
  key: string;
  windows: WindowUsage[];
}
