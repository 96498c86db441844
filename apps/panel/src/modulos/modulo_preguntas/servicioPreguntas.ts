/**
 * Servicio de preguntas: alta individual y consulta por examen.
 */
import type { ErrorApi, ErrorValidacion } from '../../compartido/errores/tiposError';
import type { Resultado } from '../../compartido/resultado';
import { validarDatos } from '../../compartido/validaciones/validar';
import type { ClienteApi } from '../../servicios_api/clienteApi';
import { decodificarEntidad, decodificarLista } from '../../servicios_api/decodificacionEntidades';
import { codigosValidacionPregunta, esquemaPreguntaNueva, esquemaPreguntaRemota } from './validacionesPreguntas';
import type { BorradorPregunta, Pregunta } from './validacionesPreguntas';

export function crearServicioPreguntas(cliente: ClienteApi) {
  async function crear(examenId: number, pregunta: BorradorPregunta): Promise<Resultado<Pregunta, ErrorApi | ErrorValidacion>> {
    const validada = validarDatos(esquemaPreguntaNueva, pregunta, codigosValidacionPregunta);
    if (!validada.ok) return validada;

    const datos = validada.valor;
    const cuerpo = {
      textoPregunta: datos.textoPregunta,
      tipoPregunta: datos.tipoPregunta,
      examenId,
      puntos: datos.puntos,
      // Las opciones se crean sin respuesta correcta; se marca despues desde el backend.
      ...(datos.tipoPregunta === 'SELECCION_UNICA'
        ? { opciones: datos.opciones.map((opcion) => ({ texto: opcion.texto, esCorrecta: false })) }
        : {})
    };

    const respuesta = await cliente.solicitar('POST', { nombre: 'preguntas' }, { cuerpo });
    if (!respuesta.ok) return respuesta;

    // El backend puede responder solo con `{ id }`; se completa con lo enviado.
    // Las opciones enviadas aun no tienen id, asi que solo cuentan las devueltas.
    const eco = typeof respuesta.valor.datos === 'object' && respuesta.valor.datos !== null ? respuesta.valor.datos : {};
    return decodificarEntidad(esquemaPreguntaRemota, {
      ...respuesta.valor,
      datos: { ...cuerpo, opciones: [], ...eco }
    });
  }

  async function listarDeExamen(examenId: number): Promise<Resultado<Pregunta[], ErrorApi>> {
    const respuesta = await cliente.solicitar('GET', { nombre: 'examenes', sufijo: `${examenId}/preguntas` });
    if (!respuesta.ok) return respuesta;
    return decodificarLista(esquemaPreguntaRemota, respuesta.valor, cliente.registrar, 'preguntas');
  }

  return { crear, listarDeExamen };
}

export type ServicioPreguntas = ReturnType<typeof crearServicioPreguntas>;
