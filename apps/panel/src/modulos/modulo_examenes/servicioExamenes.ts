/**
 * Ciclo de vida de examenes: alta, consulta, edicion, borrado y ventana activa.
 *
 * Las validaciones locales fallan antes de tocar la red. Los errores de API se
 * devuelven tal cual (estado, URL y fragmento del cuerpo); no hay reintentos.
 */
import type { ErrorApi, ErrorValidacion } from '../../compartido/errores/tiposError';
import { exito } from '../../compartido/resultado';
import type { Resultado } from '../../compartido/resultado';
import { fechaHoy } from '../../compartido/utilidades/fechas';
import type { FechaIso } from '../../compartido/utilidades/fechas';
import { validarDatos } from '../../compartido/validaciones/validar';
import type { ClienteApi } from '../../servicios_api/clienteApi';
import { decodificarEntidad, decodificarLista } from '../../servicios_api/decodificacionEntidades';
import { codigosValidacionExamen, esquemaDatosExamen, esquemaExamenRemoto } from './validacionesExamenes';
import type { DatosExamen, Examen } from './validacionesExamenes';

export type CambiosExamen = Partial<Pick<DatosExamen, 'titulo' | 'descripcion' | 'fechaInicio' | 'fechaFin'>>;

/**
 * Un examen esta activo si hoy cae dentro de `[fechaInicio, fechaFin]`
 * (ambos extremos inclusive) y tiene al menos una pregunta asociada.
 */
export function esExamenActivo(examen: Pick<Examen, 'fechaInicio' | 'fechaFin' | 'preguntasIds'>, hoy: FechaIso): boolean {
  return examen.fechaInicio <= hoy && hoy <= examen.fechaFin && examen.preguntasIds.length > 0;
}

/**
 * El PUT reemplaza el registro completo: se reenvian creador y preguntas
 * actuales para no perderlos al editar titulo, descripcion o fechas.
 */
export function aplicarEdicion(examen: Examen, cambios: CambiosExamen): DatosExamen {
  return {
    titulo: cambios.titulo ?? examen.titulo,
    descripcion: cambios.descripcion ?? examen.descripcion,
    fechaInicio: cambios.fechaInicio ?? examen.fechaInicio,
    fechaFin: cambios.fechaFin ?? examen.fechaFin,
    creadorId: examen.creadorId,
    preguntasIds: [...examen.preguntasIds]
  };
}

export function crearServicioExamenes(cliente: ClienteApi) {
  function validar(datos: DatosExamen) {
    return validarDatos(esquemaDatosExamen, datos, codigosValidacionExamen);
  }

  async function crear(datos: DatosExamen): Promise<Resultado<Examen, ErrorApi | ErrorValidacion>> {
    const validado = validar(datos);
    if (!validado.ok) return validado;

    const respuesta = await cliente.solicitar('POST', { nombre: 'examenes' }, { cuerpo: validado.valor });
    if (!respuesta.ok) return respuesta;

    // El backend devuelve `{ id, ...campos }`; lo enviado cubre campos omitidos.
    const eco = typeof respuesta.valor.datos === 'object' && respuesta.valor.datos !== null ? respuesta.valor.datos : {};
    const examen = decodificarEntidad(esquemaExamenRemoto, { ...respuesta.valor, datos: { ...validado.valor, ...eco } });
    if (examen.ok) cliente.registrar('ok', 'Examen creado', { examenId: examen.valor.id });
    return examen;
  }

  async function listar(): Promise<Resultado<Examen[], ErrorApi>> {
    const respuesta = await cliente.solicitar('GET', { nombre: 'examenes' });
    if (!respuesta.ok) return respuesta;
    return decodificarLista(esquemaExamenRemoto, respuesta.valor, cliente.registrar, 'examenes');
  }

  async function listarActivos(hoy: FechaIso = fechaHoy()): Promise<Resultado<Examen[], ErrorApi>> {
    const examenes = await listar();
    if (!examenes.ok) return examenes;
    return exito(examenes.valor.filter((examen) => esExamenActivo(examen, hoy)));
  }

  async function actualizar(id: number, datos: DatosExamen): Promise<Resultado<void, ErrorApi | ErrorValidacion>> {
    const validado = validar(datos);
    if (!validado.ok) return validado;

    const respuesta = await cliente.solicitar(
      'PUT',
      { nombre: 'examenes', sufijo: id },
      { cuerpo: validado.valor, estadoEsperado: 200, esperaCuerpo: false }
    );
    if (!respuesta.ok) return respuesta;
    cliente.registrar('ok', 'Examen actualizado', { examenId: id });
    return exito(undefined);
  }

  async function eliminar(id: number): Promise<Resultado<void, ErrorApi>> {
    const respuesta = await cliente.solicitar(
      'DELETE',
      { nombre: 'examenes', sufijo: id },
      { estadoEsperado: 204, esperaCuerpo: false }
    );
    if (!respuesta.ok) return respuesta;
    cliente.registrar('ok', 'Examen eliminado', { examenId: id });
    return exito(undefined);
  }

  return { crear, listar, listarActivos, actualizar, eliminar };
}

export type ServicioExamenes = ReturnType<typeof crearServicioExamenes>;
