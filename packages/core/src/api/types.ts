export type RequestInitWithSignal = Omit<RequestInit, "method" | "body"> & {
  signal?: AbortSignal;
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
