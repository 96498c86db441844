/**
 * Mensajes para el usuario a partir de errores tipados del panel.
 */
import type { ErrorApi, ErrorPanel } from './tiposError';

function mensajeAmigablePorStatus(status: number): string | undefined {
  if (status === 401) return 'Tu sesion expiro. Inicia sesion de nuevo.';
  if (status === 403) return 'No tienes permiso para realizar esta accion.';
  if (status === 404) return 'No se encontro el recurso solicitado.';
  if (status === 408) return 'La solicitud tardo demasiado. Intenta de nuevo.';
  if (status === 409) return 'Conflicto al guardar. Actualiza e intenta otra vez.';
  if (status === 413) return 'El archivo o datos son demasiado grandes.';
  if (status === 422) return 'Datos invalidos. Revisa los campos e intenta de nuevo.';
  if (status === 429) return 'Demasiadas solicitudes. Espera un momento e intenta de nuevo.';
  if (status >= 500) return 'El servicio tuvo un problema. Intenta mas tarde.';
  return undefined;
}

function conContexto(base: string, error: ErrorApi): string {
  const partes = [base, `URL: ${error.url}`];
  if ('fragmentoCuerpo' in error && error.fragmentoCuerpo) {
    partes.push(`Respuesta: ${error.fragmentoCuerpo}`);
  }
  return partes.join(' | ');
}

function mensajeErrorApi(error: ErrorApi): string {
  switch (error.tipo) {
    case 'CONEXION':
      return conContexto(`Sin conexion con la API: ${error.mensaje}`, error);
    case 'HTTP': {
      const amigable = mensajeAmigablePorStatus(error.status) ?? 'La API respondio con un estado inesperado.';
      return conContexto(`${amigable} (HTTP ${error.status})`, error);
    }
    case 'TIPO_CONTENIDO':
      return conContexto(`La API no devolvio JSON. Tipo de contenido: ${error.tipoContenido || 'desconocido'}`, error);
    case 'DECODIFICACION':
      return conContexto(`No se pudo procesar la respuesta de la API: ${error.mensaje}`, error);
  }
}

export function mensajeUsuarioDeError(error: ErrorPanel): string {
  switch (error.tipo) {
    case 'VALIDACION':
      return error.mensaje;
    case 'OPCION_NO_RESUELTA':
      return `La opcion "${error.etiqueta}" no existe en la pregunta ${error.preguntaId}.`;
    case 'PREGUNTA_DESCONOCIDA':
      return `La pregunta ${error.preguntaId} no pertenece al examen.`;
    case 'TIPO_NO_COINCIDE':
      return `La respuesta de la pregunta ${error.preguntaId} no corresponde a su tipo.`;
    default:
      return mensajeErrorApi(error);
  }
}
