/**
 * Cliente API defensivo del panel.
 *
 * Contrato:
 * - Nunca lanza por fallas de red, estados HTTP o cuerpos malformados: todo se
 *   devuelve como `Resultado` con un `ErrorApi` tipado.
 * - Toda solicitud lleva `Authorization: Bearer <token>`.
 * - 204/205 y cuerpos vacios equivalen a cero registros (`[]`).
 * - No reintenta; la decision de repetir es del usuario.
 */
import { fragmentar } from '../compartido/errores/tiposError';
import type { ErrorApi } from '../compartido/errores/tiposError';
import { exito, fallo } from '../compartido/resultado';
import type { Resultado } from '../compartido/resultado';
import { log } from '../infraestructura/logging/logger';
import type { Registrador } from '../infraestructura/logging/logger';
import { decodificarJson, PROFUNDIDAD_MAXIMA_POR_DEFECTO } from './decodificacionJson';
import { RUTAS_POR_DEFECTO, resolverUrl, resolverUrlConSufijo } from './registroEndpoints';
import type { NombreRecurso, RutasRecursos } from './registroEndpoints';

export type MetodoHttp = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type EndpointLogico = {
  nombre: NombreRecurso;
  sufijo?: string | number;
};

export type ValorConsulta = string | number | boolean | undefined;

export type OpcionesSolicitud = {
  cuerpo?: unknown;
  consulta?: Record<string, ValorConsulta>;
  encabezados?: Record<string, string>;
  /** Estado 2xx exacto requerido (p. ej. 201 al enviar, 204 al eliminar). */
  estadoEsperado?: number;
  /** Si es false, solo se evalua el estado y el cuerpo se descarta. */
  esperaCuerpo?: boolean;
};

export type RespuestaApi = {
  status: number;
  url: string;
  datos: unknown;
};

export type OpcionesClienteApi = {
  baseUrl: string;
  token: string;
  rutas?: Partial<RutasRecursos>;
  timeoutMs?: number;
  profundidadMaxima?: number;
  fetcher?: typeof fetch;
  registrar?: Registrador;
};

type RespuestaCruda = {
  status: number;
  tipoContenido: string;
  texto: string;
};

const ESTADOS_SIN_CONTENIDO = new Set([204, 205]);

function esAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

function describirError(error: unknown) {
  if (error instanceof Error) {
    const causa = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${causa}`;
  }
  return String(error);
}

function agregarConsulta(url: string, consulta?: Record<string, ValorConsulta>) {
  if (!consulta) return url;
  const parametros = new URLSearchParams();
  for (const [clave, valor] of Object.entries(consulta)) {
    if (valor !== undefined) parametros.append(clave, String(valor));
  }
  const texto = parametros.toString();
  return texto ? `${url}?${texto}` : url;
}

export function crearClienteApi(opts: OpcionesClienteApi) {
  const rutas: RutasRecursos = { ...RUTAS_POR_DEFECTO, ...opts.rutas };
  const timeoutMs = opts.timeoutMs ?? 12_000;
  const profundidadMaxima = opts.profundidadMaxima ?? PROFUNDIDAD_MAXIMA_POR_DEFECTO;
  const fetcher = opts.fetcher ?? globalThis.fetch;
  const registrar: Registrador = opts.registrar ?? log;

  function resolver(endpoint: EndpointLogico) {
    return endpoint.sufijo === undefined
      ? resolverUrl(opts.baseUrl, endpoint.nombre, rutas)
      : resolverUrlConSufijo(opts.baseUrl, endpoint.nombre, endpoint.sufijo, rutas);
  }

  function reportar(error: ErrorApi, metodo: MetodoHttp): Resultado<never, ErrorApi> {
    registrar('warn', 'Solicitud a la API fallida', {
      metodo,
      tipo: error.tipo,
      url: error.url,
      ...(error.tipo === 'HTTP' ? { status: error.status } : {})
    });
    return fallo(error);
  }

  async function transmitir(
    metodo: MetodoHttp,
    url: string,
    encabezados: Record<string, string>,
    cuerpo: string | undefined
  ): Promise<Resultado<RespuestaCruda, ErrorApi>> {
    const controller = new AbortController();
    const timer = timeoutMs > 0 ? globalThis.setTimeout(() => controller.abort(), timeoutMs) : null;
    try {
      const respuesta = await fetcher(url, { method: metodo, headers: encabezados, body: cuerpo, signal: controller.signal });
      const texto = await respuesta.text();
      return exito({
        status: respuesta.status,
        tipoContenido: respuesta.headers.get('content-type') ?? '',
        texto
      });
    } catch (error) {
      const mensaje = esAbortError(error) ? `Tiempo de espera agotado (${timeoutMs} ms)` : describirError(error);
      return fallo({ tipo: 'CONEXION', mensaje, url });
    } finally {
      if (timer) globalThis.clearTimeout(timer);
    }
  }

  async function solicitar(
    metodo: MetodoHttp,
    endpoint: EndpointLogico,
    opciones: OpcionesSolicitud = {}
  ): Promise<Resultado<RespuestaApi, ErrorApi>> {
    const url = agregarConsulta(resolver(endpoint), opciones.consulta);
    const tieneCuerpo = opciones.cuerpo !== undefined;
    // Authorization solo la pone el cliente, en cualquier capitalizacion.
    const propios = Object.entries(opciones.encabezados ?? {}).filter(
      ([nombre]) => nombre.toLowerCase() !== 'authorization'
    );
    const encabezados: Record<string, string> = {
      Accept: 'application/json',
      ...(tieneCuerpo ? { 'Content-Type': 'application/json' } : {}),
      ...Object.fromEntries(propios),
      Authorization: `Bearer ${opts.token}`
    };

    const cruda = await transmitir(metodo, url, encabezados, tieneCuerpo ? JSON.stringify(opciones.cuerpo) : undefined);
    if (!cruda.ok) return reportar(cruda.error, metodo);

    const { status, tipoContenido, texto } = cruda.valor;
    const fueraDeRango = status < 200 || status >= 300;
    const noEsperado = opciones.estadoEsperado !== undefined && status !== opciones.estadoEsperado;
    if (fueraDeRango || noEsperado) {
      return reportar({ tipo: 'HTTP', status, url, fragmentoCuerpo: fragmentar(texto) }, metodo);
    }

    if (opciones.esperaCuerpo === false || ESTADOS_SIN_CONTENIDO.has(status)) {
      return exito({ status, url, datos: [] });
    }

    if (!tipoContenido.toLowerCase().includes('application/json')) {
      return reportar({ tipo: 'TIPO_CONTENIDO', tipoContenido, fragmentoCuerpo: fragmentar(texto), url }, metodo);
    }

    const decodificado = decodificarJson(texto, profundidadMaxima);
    if (!decodificado.ok) {
      return reportar({ tipo: 'DECODIFICACION', mensaje: decodificado.error, fragmentoCuerpo: fragmentar(texto), url }, metodo);
    }

    return exito({ status, url, datos: decodificado.valor });
  }

  return { baseUrl: opts.baseUrl, resolver, solicitar, registrar };
}

export type ClienteApi = ReturnType<typeof crearClienteApi>;
