/**
 * Validaciones de examenes: datos capturados y registros del backend.
 */
import { z } from 'zod';
import { esquemaIdRemoto } from '../../compartido/tipos/dominio';
import { esquemaFechaIso, esquemaFechaRemota } from '../../compartido/utilidades/fechas';

export const esquemaDatosExamen = z
  .object({
    titulo: z.string().trim().min(1, 'El titulo es obligatorio'),
    descripcion: z.string().default(''),
    fechaInicio: esquemaFechaIso,
    fechaFin: esquemaFechaIso,
    creadorId: z.number().int().positive('creadorId debe ser un entero positivo'),
    preguntasIds: z.array(z.number().int().positive()).default([])
  })
  .refine((datos) => datos.fechaInicio < datos.fechaFin, {
    message: 'La fecha de inicio debe ser anterior a la de fin',
    path: ['rangoFechas']
  });

export const codigosValidacionExamen: Record<string, string> = {
  titulo: 'TITULO_REQUERIDO',
  fechaInicio: 'FECHA_INVALIDA',
  fechaFin: 'FECHA_INVALIDA',
  rangoFechas: 'RANGO_FECHAS_INVALIDO',
  creadorId: 'CREADOR_INVALIDO'
};

/** Lo que captura el panel (descripcion y preguntas son opcionales). */
export type DatosExamen = z.input<typeof esquemaDatosExamen>;

export const esquemaExamenRemoto = z.object({
  id: esquemaIdRemoto,
  titulo: z.string(),
  descripcion: z.string().catch(''),
  fechaInicio: esquemaFechaRemota,
  fechaFin: esquemaFechaRemota,
  creadorId: esquemaIdRemoto,
  creadorNombre: z.string().optional().catch(undefined),
  preguntasIds: z
    .array(esquemaIdRemoto)
    .nullish()
    .transform((ids) => ids ?? [])
});

export type Examen = z.output<typeof esquemaExamenRemoto>;
