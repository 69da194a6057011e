export type Success<T> = { success: true; data: T; error: null };
export type Failure<E = Error> = { success: false; data: null; error: E };
export type Result<T, E = Error> = Success<T> | Failure<E>;
