/**
 * API publica del panel de evaluaciones.
 */
export { configuracion, leerConfiguracion } from './configuracion';
export type { ConfiguracionPanel } from './configuracion';
export { crearServiciosPanel } from './panel';
export type { ServiciosPanel } from './panel';
export { ejecutarPanel } from './comandosPanel';

export { exito, fallo } from './compartido/resultado';
export type { Resultado } from './compartido/resultado';
export type { ErrorApi, ErrorEnsamblado, ErrorPanel, ErrorValidacion } from './compartido/errores/tiposError';
export { mensajeUsuarioDeError } from './compartido/errores/mensajesError';
export { fechaHoy } from './compartido/utilidades/fechas';
export type { FechaIso } from './compartido/utilidades/fechas';
export { aFilasTabla, COLUMNAS_OCULTAS_EXAMEN } from './compartido/utilidades/tablas';

export { RUTAS_POR_DEFECTO, resolverUrl, resolverUrlConSufijo, unirUrl } from './servicios_api/registroEndpoints';
export type { NombreRecurso, RutasRecursos } from './servicios_api/registroEndpoints';
export { crearClienteApi } from './servicios_api/clienteApi';
export type { ClienteApi, EndpointLogico, MetodoHttp, OpcionesSolicitud, RespuestaApi } from './servicios_api/clienteApi';
export { decodificarJson } from './servicios_api/decodificacionJson';

export { aplicarEdicion, crearServicioExamenes, esExamenActivo } from './modulos/modulo_examenes/servicioExamenes';
export type { CambiosExamen, ServicioExamenes } from './modulos/modulo_examenes/servicioExamenes';
export type { Examen, DatosExamen } from './modulos/modulo_examenes/validacionesExamenes';
export { crearServicioCreacionExamen, resumirCreacion } from './modulos/modulo_examenes/servicioCreacionExamen';
export type {
  ResultadoCreacion,
  ResultadoPregunta,
  ServicioCreacionExamen
} from './modulos/modulo_examenes/servicioCreacionExamen';
export type { ConteoMensual } from './modulos/modulo_examenes/servicioEstadisticas';
export { contarExamenesPorMes } from './modulos/modulo_examenes/servicioEstadisticas';
export { crearServicioPreguntas } from './modulos/modulo_preguntas/servicioPreguntas';
export type { ServicioPreguntas } from './modulos/modulo_preguntas/servicioPreguntas';
export type { BorradorPregunta, Opcion, Pregunta } from './modulos/modulo_preguntas/validacionesPreguntas';
export {
  construirEnvio,
  crearSesionRespuestas,
  prepararPreguntasAlumno
} from './modulos/modulo_respuestas/ensambladorEnvio';
export type { EnvioRespuestas, RespuestaEnCurso, SesionRespuestas } from './modulos/modulo_respuestas/ensambladorEnvio';
export { crearServicioEnvio } from './modulos/modulo_respuestas/servicioEnvio';
export type { ServicioEnvio } from './modulos/modulo_respuestas/servicioEnvio';
export { crearServicioUsuarios } from './modulos/modulo_usuarios/servicioUsuarios';
export type { ServicioUsuarios, Usuario } from './modulos/modulo_usuarios/servicioUsuarios';
export { crearSesionPanel, MENUS_POR_ROL, ROLES } from './sesion/sesionPanel';
export type { RolPanel, SeccionPanel, SesionPanel } from './sesion/sesionPanel';
