// src/utils/result.ts
// Best-effort steps return a Result so the degrade path is explicit at the call site.

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

export async function attempt<T, E>(
    task: () => Promise<T>,
    wrap: (cause: unknown) => E,
): Promise<Result<T, E>> {
    try {
        return ok(await task());
    } catch (cause) {
        return err(wrap(cause));
    }
}

export function recover<T, E>(result: Result<T, E>, fallback: T): T {
    return result.ok ? result.value : fallback;
}
