/**
 * Fechas de calendario en formato ISO `YYYY-MM-DD`.
 *
 * Con ese formato el orden lexicografico coincide con el cronologico, por eso
 * las comparaciones de ventanas de examen se hacen directamente sobre strings.
 */
import { z } from 'zod';

export type FechaIso = string;

const patronFecha = /^(\d{4})-(\d{2})-(\d{2})/;

export function esFechaCalendarioValida(valor: string): boolean {
  const coincidencia = patronFecha.exec(valor);
  if (!coincidencia) return false;
  const [anio, mes, dia] = [Number(coincidencia[1]), Number(coincidencia[2]), Number(coincidencia[3])];
  const fecha = new Date(Date.UTC(anio, mes - 1, dia));
  return fecha.getUTCFullYear() === anio && fecha.getUTCMonth() === mes - 1 && fecha.getUTCDate() === dia;
}

function dosDigitos(n: number) {
  return String(n).padStart(2, '0');
}

export function fechaHoy(ahora: Date = new Date()): FechaIso {
  return `${ahora.getFullYear()}-${dosDigitos(ahora.getMonth() + 1)}-${dosDigitos(ahora.getDate())}`;
}

/** Fecha capturada localmente: exactamente `YYYY-MM-DD`. */
export const esquemaFechaIso = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Fecha invalida, se espera YYYY-MM-DD')
  .refine(esFechaCalendarioValida, 'Fecha inexistente');

/** Fecha recibida del backend: acepta timestamps y conserva solo la parte de fecha. */
export const esquemaFechaRemota = z
  .string()
  .refine(esFechaCalendarioValida, 'Fecha invalida')
  .transform((valor) => valor.slice(0, 10));
