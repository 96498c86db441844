/**
 * Registro de endpoints del backend de evaluaciones.
 *
 * Traduce nombres logicos de recurso a rutas relativas y las une con la URL
 * base. Un nombre desconocido es un error de programacion: se lanza de
 * inmediato en lugar de devolverse como resultado.
 */
export type NombreRecurso = 'examenes' | 'preguntas' | 'resultados' | 'usuarios';

export type RutasRecursos = Record<NombreRecurso, string>;

export const RUTAS_POR_DEFECTO: Readonly<RutasRecursos> = Object.freeze({
  examenes: '/examenes',
  preguntas: '/preguntas',
  resultados: '/resultados',
  usuarios: '/admin/users'
});

function esNombreRecurso(nombre: string, rutas: Readonly<RutasRecursos>): nombre is NombreRecurso {
  return Object.prototype.hasOwnProperty.call(rutas, nombre);
}

function sinBarrasFinales(valor: string) {
  return valor.replace(/\/+$/, '');
}

function sinBarrasIniciales(valor: string) {
  return valor.replace(/^\/+/, '');
}

export function unirUrl(base: string, ...segmentos: string[]): string {
  return segmentos
    .map((segmento) => sinBarrasFinales(sinBarrasIniciales(segmento.trim())))
    .filter(Boolean)
    .reduce((acumulado, segmento) => `${acumulado}/${segmento}`, sinBarrasFinales(base.trim()));
}

export function rutaDeRecurso(nombre: string, rutas: Readonly<RutasRecursos> = RUTAS_POR_DEFECTO): string {
  if (!esNombreRecurso(nombre, rutas)) {
    throw new Error(`Recurso de API desconocido: ${nombre}`);
  }
  return rutas[nombre];
}

export function resolverUrl(baseUrl: string, nombre: NombreRecurso, rutas: Readonly<RutasRecursos> = RUTAS_POR_DEFECTO) {
  return unirUrl(baseUrl, rutaDeRecurso(nombre, rutas));
}

/** Recursos anidados, p. ej. `resolverUrlConSufijo(base, 'examenes', '7/preguntas')`. */
export function resolverUrlConSufijo(
  baseUrl: string,
  nombre: NombreRecurso,
  sufijo: string | number,
  rutas: Readonly<RutasRecursos> = RUTAS_POR_DEFECTO
) {
  return unirUrl(baseUrl, rutaDeRecurso(nombre, rutas), String(sufijo));
}
