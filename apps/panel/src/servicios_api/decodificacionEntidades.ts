/**
 * Frontera entre JSON sin tipo y entidades del dominio.
 *
 * Ningun mapa sin tipo pasa de aqui: las respuestas se convierten en
 * entidades con Zod o se reportan como `DECODIFICACION`.
 */
import type { z } from 'zod';
import { fragmentar } from '../compartido/errores/tiposError';
import type { ErrorApi } from '../compartido/errores/tiposError';
import { exito, fallo } from '../compartido/resultado';
import type { Resultado } from '../compartido/resultado';
import type { Registrador } from '../infraestructura/logging/logger';
import type { RespuestaApi } from './clienteApi';

function fragmentoDe(datos: unknown) {
  try {
    return fragmentar(JSON.stringify(datos) ?? String(datos));
  } catch {
    return fragmentar(String(datos));
  }
}

function tipoRecibido(datos: unknown) {
  if (Array.isArray(datos)) return 'array';
  if (datos === null) return 'null';
  return typeof datos;
}

export function decodificarEntidad<S extends z.ZodTypeAny>(
  esquema: S,
  respuesta: RespuestaApi
): Resultado<z.output<S>, ErrorApi> {
  const resultado = esquema.safeParse(respuesta.datos);
  if (resultado.success) return exito(resultado.data);

  const problema = resultado.error.issues[0];
  const ruta = problema?.path.join('.') || 'raiz';
  return fallo({
    tipo: 'DECODIFICACION',
    mensaje: `Registro invalido en ${ruta}: ${problema?.message ?? 'formato desconocido'}`,
    fragmentoCuerpo: fragmentoDe(respuesta.datos),
    url: respuesta.url
  });
}

/**
 * Decodifica una lista. Los registros que no cumplen el esquema se descartan
 * y se registran como advertencia; un cuerpo que no es arreglo es un error.
 */
export function decodificarLista<S extends z.ZodTypeAny>(
  esquema: S,
  respuesta: RespuestaApi,
  registrar: Registrador,
  recurso: string
): Resultado<Array<z.output<S>>, ErrorApi> {
  const { datos } = respuesta;
  if (!Array.isArray(datos)) {
    return fallo({
      tipo: 'DECODIFICACION',
      mensaje: `Se esperaba una lista de ${recurso}; tipo recibido: ${tipoRecibido(datos)}`,
      fragmentoCuerpo: fragmentoDe(datos),
      url: respuesta.url
    });
  }

  const elementos: Array<z.output<S>> = [];
  let descartados = 0;
  for (const registro of datos) {
    const resultado = esquema.safeParse(registro);
    if (resultado.success) elementos.push(resultado.data);
    else descartados += 1;
  }

  if (descartados > 0) {
    registrar('warn', 'Registros descartados por formato invalido', { recurso, descartados, url: respuesta.url });
  }
  return exito(elementos);
}
