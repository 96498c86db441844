/**
 * Creacion de un examen con sus preguntas en varios pasos.
 *
 * 1) Se crea el examen sin preguntas; si falla, no se intenta ninguna pregunta.
 * 2) Cada pregunta se crea por separado con el id del examen. Una falla se
 *    registra en su resultado y se continua con la siguiente; no se revierte
 *    el examen ni las preguntas ya creadas.
 */
import { mensajeUsuarioDeError } from '../../compartido/errores/mensajesError';
import { errorValidacion } from '../../compartido/errores/tiposError';
import type { ErrorApi, ErrorValidacion } from '../../compartido/errores/tiposError';
import { exito, fallo } from '../../compartido/resultado';
import type { Resultado } from '../../compartido/resultado';
import type { Registrador } from '../../infraestructura/logging/logger';
import type { ServicioPreguntas } from '../modulo_preguntas/servicioPreguntas';
import type { BorradorPregunta, Pregunta } from '../modulo_preguntas/validacionesPreguntas';
import type { ServicioExamenes } from './servicioExamenes';
import type { DatosExamen, Examen } from './validacionesExamenes';

export const MAXIMO_PREGUNTAS_POR_EXAMEN = 20;

export type ResultadoPregunta =
  | { indice: number; textoPregunta: string; ok: true; pregunta: Pregunta }
  | { indice: number; textoPregunta: string; ok: false; error: ErrorApi | ErrorValidacion };

export type ResultadoCreacion = {
  examen: Examen;
  preguntas: ResultadoPregunta[];
};

export function crearServicioCreacionExamen(deps: {
  examenes: ServicioExamenes;
  preguntas: ServicioPreguntas;
  registrar: Registrador;
}) {
  async function crearExamenConPreguntas(
    datos: DatosExamen,
    pendientes: readonly BorradorPregunta[]
  ): Promise<Resultado<ResultadoCreacion, ErrorApi | ErrorValidacion>> {
    if (pendientes.length > MAXIMO_PREGUNTAS_POR_EXAMEN) {
      return fallo(
        errorValidacion(
          'DEMASIADAS_PREGUNTAS',
          `Se permiten a lo mas ${MAXIMO_PREGUNTAS_POR_EXAMEN} preguntas por examen (recibidas: ${pendientes.length})`
        )
      );
    }

    const creado = await deps.examenes.crear({ ...datos, preguntasIds: [] });
    if (!creado.ok) return creado;
    const examen = creado.valor;

    const preguntas: ResultadoPregunta[] = [];
    for (const [indice, pendiente] of pendientes.entries()) {
      const textoPregunta = pendiente.textoPregunta;
      const resultado = await deps.preguntas.crear(examen.id, pendiente);
      if (resultado.ok) {
        preguntas.push({ indice, textoPregunta, ok: true, pregunta: resultado.valor });
      } else {
        deps.registrar('warn', 'Pregunta no creada', {
          examenId: examen.id,
          indice,
          error: resultado.error.tipo
        });
        preguntas.push({ indice, textoPregunta, ok: false, error: resultado.error });
      }
    }

    return exito({ examen, preguntas });
  }

  return { crearExamenConPreguntas };
}

export type ServicioCreacionExamen = ReturnType<typeof crearServicioCreacionExamen>;

/** Texto para el usuario: "Examen creado (ID 7). Preguntas agregadas: 2/3. Fallidas: ..." */
export function resumirCreacion({ examen, preguntas }: ResultadoCreacion): string {
  const exitosas = preguntas.filter((resultado) => resultado.ok).length;
  const base = `Examen creado (ID ${examen.id}). Preguntas agregadas: ${exitosas}/${preguntas.length}.`;
  const fallidas = preguntas.flatMap((resultado) =>
    resultado.ok ? [] : [`#${resultado.indice + 1} "${resultado.textoPregunta}": ${mensajeUsuarioDeError(resultado.error)}`]
  );
  return fallidas.length ? `${base} Fallidas: ${fallidas.join('; ')}` : base;
}
