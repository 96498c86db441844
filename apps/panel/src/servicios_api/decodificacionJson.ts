/**
 * Decodificacion defensiva de cuerpos JSON.
 *
 * Pipeline: parseo estricto -> un unico intento de normalizacion (trim y
 * verificacion de delimitadores `[...]`/`{...}`) -> verificacion de
 * profundidad -> error tipado. Solo se aceptan objetos o arreglos.
 */
import { exito, fallo } from '../compartido/resultado';
import type { Resultado } from '../compartido/resultado';

export const PROFUNDIDAD_MAXIMA_POR_DEFECTO = 100;

function parsear(texto: string): Resultado<unknown, string> {
  try {
    const valor: unknown = JSON.parse(texto);
    return exito(valor);
  } catch (error) {
    return fallo(error instanceof Error ? error.message : String(error));
  }
}

function estaDelimitado(texto: string) {
  return (texto.startsWith('[') && texto.endsWith(']')) || (texto.startsWith('{') && texto.endsWith('}'));
}

function describirTipo(valor: unknown) {
  if (valor === null) return 'null';
  return typeof valor;
}

/**
 * Profundidad de anidamiento de un valor JSON ya parseado: un objeto o arreglo
 * suma un nivel, los escalares no. Recorre iterativamente y se detiene en
 * cuanto supera `limite`.
 */
export function medirProfundidad(raiz: unknown, limite: number): number {
  let maxima = 0;
  const pendientes: Array<[unknown, number]> = [[raiz, 1]];

  while (pendientes.length > 0) {
    const siguiente = pendientes.pop();
    if (!siguiente) break;
    const [nodo, nivel] = siguiente;
    if (typeof nodo !== 'object' || nodo === null) continue;

    if (nivel > maxima) maxima = nivel;
    if (maxima > limite) return maxima;

    const hijos: unknown[] = Array.isArray(nodo) ? nodo : Object.values(nodo);
    for (const hijo of hijos) pendientes.push([hijo, nivel + 1]);
  }

  return maxima;
}

/**
 * Decodifica `texto`. Un cuerpo vacio (o solo espacios) equivale a cero
 * registros y produce `[]`; no es un error.
 */
export function decodificarJson(texto: string, profundidadMaxima = PROFUNDIDAD_MAXIMA_POR_DEFECTO): Resultado<unknown, string> {
  if (texto.trim() === '') return exito([]);

  let parseado = parsear(texto);
  if (!parseado.ok) {
    const limpio = texto.trim();
    if (!estaDelimitado(limpio)) return parseado;
    parseado = parsear(limpio);
    if (!parseado.ok) return parseado;
  }

  const valor = parseado.valor;
  if (typeof valor !== 'object' || valor === null) {
    return fallo(`Se esperaba un objeto o arreglo JSON; se recibio ${describirTipo(valor)}`);
  }

  if (medirProfundidad(valor, profundidadMaxima) > profundidadMaxima) {
    return fallo(`Limite de anidamiento alcanzado (maximo ${profundidadMaxima})`);
  }

  return exito(valor);
}
