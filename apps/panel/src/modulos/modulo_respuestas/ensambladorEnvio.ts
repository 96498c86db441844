/**
 * Respuestas en curso de un examen y armado del envio final.
 *
 * Estados de la sesion: VACIA -> EN_PROGRESO (al registrar la primera
 * respuesta) -> ENVIADA (solo cuando el backend acepta el envio con 201).
 */
import type { ErrorEnsamblado } from '../../compartido/errores/tiposError';
import { exito, fallo } from '../../compartido/resultado';
import type { Resultado } from '../../compartido/resultado';
import type { TipoPregunta } from '../../compartido/tipos/dominio';
import type { Pregunta } from '../modulo_preguntas/validacionesPreguntas';

export type RespuestaEnCurso =
  | { tipo: 'SELECCION_UNICA'; etiqueta: string }
  | { tipo: 'TEXTO_ABIERTO'; texto: string };

export type EstadoSesionRespuestas = 'VACIA' | 'EN_PROGRESO' | 'ENVIADA';

export type RespuestaTexto = {
  preguntaId: number;
  respuesta: string;
};

export type EnvioRespuestas = {
  examenId: number;
  opcionesSeleccionadas: number[];
  respuestasTexto: RespuestaTexto[];
};

/** Lo minimo de una pregunta que se necesita para resolver respuestas. */
export type PreguntaResoluble = {
  id: number;
  tipoPregunta: TipoPregunta;
  opciones: ReadonlyArray<{ id: number; texto: string }>;
};

export type PreguntaAlumno = Omit<Pregunta, 'opciones'> & {
  opciones: Array<{ id: number; texto: string }>;
};

/** Vista para el alumno: nunca incluye `esCorrecta`. */
export function prepararPreguntasAlumno(preguntas: readonly Pregunta[]): PreguntaAlumno[] {
  return preguntas.map((pregunta) => ({
    ...pregunta,
    opciones: pregunta.opciones.map(({ id, texto }) => ({ id, texto }))
  }));
}

export function crearSesionRespuestas(examenId: number) {
  const respuestas = new Map<number, RespuestaEnCurso>();
  let enviada = false;

  function estado(): EstadoSesionRespuestas {
    if (enviada) return 'ENVIADA';
    return respuestas.size > 0 ? 'EN_PROGRESO' : 'VACIA';
  }

  /** Sobrescribe la respuesta previa de la misma pregunta. Un texto vacio la elimina. */
  function registrar(preguntaId: number, respuesta: RespuestaEnCurso) {
    if (enviada) {
      throw new Error(`La sesion del examen ${examenId} ya fue enviada`);
    }
    if (respuesta.tipo === 'TEXTO_ABIERTO' && respuesta.texto.trim() === '') {
      respuestas.delete(preguntaId);
      return;
    }
    respuestas.set(preguntaId, respuesta);
  }

  function obtener(preguntaId: number) {
    return respuestas.get(preguntaId);
  }

  function instantanea(): ReadonlyMap<number, RespuestaEnCurso> {
    return new Map(respuestas);
  }

  function marcarEnviada() {
    enviada = true;
  }

  return { examenId, estado, registrar, obtener, instantanea, marcarEnviada };
}

export type SesionRespuestas = ReturnType<typeof crearSesionRespuestas>;

/**
 * Transforma las respuestas acumuladas en el cuerpo que espera el backend.
 * Una etiqueta de seleccion unica se resuelve al id de la opcion cuyo texto
 * coincide exactamente.
 */
export function construirEnvio(
  examenId: number,
  respuestas: ReadonlyMap<number, RespuestaEnCurso>,
  preguntas: readonly PreguntaResoluble[]
): Resultado<EnvioRespuestas, ErrorEnsamblado> {
  const preguntasPorId = new Map(preguntas.map((pregunta) => [pregunta.id, pregunta]));
  const opcionesSeleccionadas: number[] = [];
  const respuestasTexto: RespuestaTexto[] = [];

  for (const [preguntaId, respuesta] of respuestas) {
    const pregunta = preguntasPorId.get(preguntaId);
    if (!pregunta) return fallo({ tipo: 'PREGUNTA_DESCONOCIDA', preguntaId });
    if (pregunta.tipoPregunta !== respuesta.tipo) return fallo({ tipo: 'TIPO_NO_COINCIDE', preguntaId });

    if (respuesta.tipo === 'SELECCION_UNICA') {
      const opcion = pregunta.opciones.find((candidata) => candidata.texto === respuesta.etiqueta);
      if (!opcion) return fallo({ tipo: 'OPCION_NO_RESUELTA', preguntaId, etiqueta: respuesta.etiqueta });
      opcionesSeleccionadas.push(opcion.id);
    } else {
      respuestasTexto.push({ preguntaId, respuesta: respuesta.texto });
    }
  }

  return exito({ examenId, opcionesSeleccionadas, respuestasTexto });
}
