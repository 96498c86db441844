/**
 * Taxonomia de errores del panel.
 *
 * Los errores de validacion se detectan localmente y nunca llegan a la red.
 * Los de API describen lo que ocurrio con la solicitud (URL, estado, fragmento
 * del cuerpo) para poder diagnosticar sin herramientas de desarrollo.
 */
export type ErrorApi =
  | { tipo: 'CONEXION'; mensaje: string; url: string }
  | { tipo: 'HTTP'; status: number; url: string; fragmentoCuerpo: string }
  | { tipo: 'TIPO_CONTENIDO'; tipoContenido: string; fragmentoCuerpo: string; url: string }
  | { tipo: 'DECODIFICACION'; mensaje: string; fragmentoCuerpo: string; url: string };

export type ErrorValidacion = {
  tipo: 'VALIDACION';
  codigo: string;
  mensaje: string;
  detalles?: unknown;
};

export type ErrorEnsamblado =
  | { tipo: 'OPCION_NO_RESUELTA'; preguntaId: number; etiqueta: string }
  | { tipo: 'PREGUNTA_DESCONOCIDA'; preguntaId: number }
  | { tipo: 'TIPO_NO_COINCIDE'; preguntaId: number };

export type ErrorPanel = ErrorApi | ErrorValidacion | ErrorEnsamblado;

export const LIMITE_FRAGMENTO = 500;

export function fragmentar(texto: string, limite = LIMITE_FRAGMENTO) {
  return texto.length > limite ? `${texto.slice(0, limite)}...` : texto;
}

export function errorValidacion(codigo: string, mensaje: string, detalles?: unknown): ErrorValidacion {
  return detalles === undefined ? { tipo: 'VALIDACION', codigo, mensaje } : { tipo: 'VALIDACION', codigo, mensaje, detalles };
}
