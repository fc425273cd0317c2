/** The subset of the global `fetch` the upstream clients use; tests pass a scripted one. */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
