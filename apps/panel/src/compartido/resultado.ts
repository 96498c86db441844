/**
 * Resultado tipado: las fallas esperadas se devuelven, no se lanzan.
 */
export type Resultado<T, E> = { ok: true; valor: T } | { ok: false; error: E };

export function exito<T>(valor: T): Resultado<T, never> {
  return { ok: true, valor };
}

export function fallo<E>(error: E): Resultado<never, E> {
  return { ok: false, error };
}
