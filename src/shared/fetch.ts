/** `fetch`-compatible function, injectable so HTTP clients can be tested offline. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => fetch(url, init);
