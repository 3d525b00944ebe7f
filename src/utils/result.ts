/**
 * Resultado tipado para operaciones que pueden fallar.
 *
 * Encaje en el sistema:
 * - Repositorios y servicios de moderación devuelven `Result` en lugar de lanzar, así un
 *   fallo puntual (Mongo caído, Discord rechazando la acción) nunca derriba el proceso.
 * - Permite distinguir entre "no hay dato" (`Ok(null)`) y "falló la operación" (`Err(error)`).
 *
 * Contrato:
 * - `unwrap()` solo existe en `Ok`. Los callers deben chequear `isErr()` antes; tras el
 *   guard, TypeScript estrecha la unión y `unwrap()` queda disponible.
 *
 * Ejemplo:
 * ```ts
 * const res = await repo.findOne(guildId, id);
 * if (res.isErr()) return ErrResult(res.error);
 * const record = res.unwrap();
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }
}

export class Err<T, E> {
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }
}

/** Crea un resultado exitoso. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Crea un resultado fallido. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Normaliza cualquier valor capturado en un `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
