/**
 * The subset of the global fetch the HTTP adapters use; tests pass a fake.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const globalFetch: FetchLike = (input, init) => fetch(input, init);
