/**
 * Registro estructurado del panel: una linea JSON por evento.
 *
 * Las lineas van a stderr; stdout queda para la salida de los comandos.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

export type Meta = Record<string, unknown>;

/** Firma que reciben los servicios para registrar eventos. */
export type Registrador = (level: NivelLog, msg: string, meta?: Meta) => void;

const SERVICIO = 'panel-evaluaciones';

function serializarError(error: unknown) {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    const causa = error.cause instanceof Error ? error.cause.message : undefined;
    return { name: error.name, message: error.message, stack: error.stack, causa };
  }
  return { value: String(error) };
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  // En pruebas no se escribe nada.
  if (process.env.NODE_ENV === 'test') return;

  const linea = JSON.stringify({ ts: new Date().toISOString(), service: SERVICIO, level, msg, ...meta });
  process.stderr.write(`${linea}\n`);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}
