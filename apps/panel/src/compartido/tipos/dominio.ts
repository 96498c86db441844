/**
 * Tipos compartidos del dominio.
 */
import { z } from 'zod';

export const TIPOS_PREGUNTA = ['SELECCION_UNICA', 'TEXTO_ABIERTO'] as const;
export type TipoPregunta = (typeof TIPOS_PREGUNTA)[number];

export const esquemaTipoPregunta = z.enum(TIPOS_PREGUNTA);

/** Identificador asignado por el backend; tambien llega como string de digitos. */
export const esquemaIdRemoto = z
  .union([z.number(), z.string().regex(/^\d+$/, 'Id no numerico')])
  .pipe(z.coerce.number().int().positive());
