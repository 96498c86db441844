/**
 * Helpers de validacion con Zod para datos capturados en el panel.
 */
import type { z } from 'zod';
import { errorValidacion } from '../errores/tiposError';
import type { ErrorValidacion } from '../errores/tiposError';
import { exito, fallo } from '../resultado';
import type { Resultado } from '../resultado';

/**
 * Valida `datos` contra `esquema`. El codigo del error se elige por el primer
 * campo con problema (`codigosPorCampo`), o `DATOS_INVALIDOS` si no hay mapeo.
 */
export function validarDatos<S extends z.ZodTypeAny>(
  esquema: S,
  datos: unknown,
  codigosPorCampo: Record<string, string> = {}
): Resultado<z.output<S>, ErrorValidacion> {
  const resultado = esquema.safeParse(datos);
  if (resultado.success) return exito(resultado.data);

  const primero = resultado.error.issues[0];
  const campo = primero?.path[0];
  const codigo = (typeof campo === 'string' && codigosPorCampo[campo]) || 'DATOS_INVALIDOS';
  return fallo(errorValidacion(codigo, primero?.message ?? 'Datos invalidos', resultado.error.flatten()));
}
