/**
 * Conversion de registros a filas planas para mostrarse como tabla.
 */
export type CeldaTabla = string | number | boolean | null;
export type FilaTabla = Record<string, CeldaTabla>;

export const COLUMNAS_OCULTAS_EXAMEN = ['creadorId', 'creadorNombre', 'preguntasIds'] as const;

function aCelda(valor: unknown): CeldaTabla {
  if (valor === undefined || valor === null) return null;
  if (typeof valor === 'string' || typeof valor === 'number' || typeof valor === 'boolean') return valor;
  return JSON.stringify(valor);
}

export function aFilasTabla(registros: readonly object[], columnasOcultas: readonly string[] = []): FilaTabla[] {
  const ocultas = new Set(columnasOcultas);
  return registros.map((registro) => {
    const fila: FilaTabla = {};
    for (const [columna, valor] of Object.entries(registro)) {
      if (!ocultas.has(columna)) fila[columna] = aCelda(valor);
    }
    return fila;
  });
}

/**
 * Texto tabulado: una linea de encabezados y una por registro. Las columnas
 * son la union de las claves de todas las filas, en orden de aparicion.
 */
export function formatearTabla(filas: readonly FilaTabla[]): string[] {
  if (filas.length === 0) return [];
  const columnas = [...new Set(filas.flatMap((fila) => Object.keys(fila)))];
  return [columnas.join('\t'), ...filas.map((fila) => columnas.map((columna) => String(fila[columna] ?? '')).join('\t'))];
}
