// Harness estricto para las pruebas del panel (solo Node).
import { afterAll, afterEach, beforeAll, vi } from 'vitest';

type OpcionesHarness = {
  /** Patrones de console.warn/error que no hacen fallar la prueba. */
  consolaPermitida?: Array<string | RegExp>;
  /** Patrones de `process.warning` tolerados (p. ej. DeprecationWarning). */
  avisosPermitidos?: Array<string | RegExp>;
};

function coincide(texto: string, patrones: Array<string | RegExp>) {
  return patrones.some((patron) => (typeof patron === 'string' ? texto.includes(patron) : patron.test(texto)));
}

function describir(valor: unknown): string {
  if (valor instanceof Error) return `${valor.name}: ${valor.message}`;
  if (typeof valor === 'string') return valor;
  try {
    return JSON.stringify(valor) ?? String(valor);
  } catch {
    return String(valor);
  }
}

/**
 * Hace fallar la prueba en curso ante `console.warn`/`console.error`,
 * promesas rechazadas sin manejar, excepciones no capturadas o avisos del
 * proceso. `ALLOW_TEST_CONSOLE=1` desactiva la revision de consola.
 */
export function instalarTestHardening(opts: OpcionesHarness = {}) {
  const revisarConsola = process.env.ALLOW_TEST_CONSOLE !== '1';
  const consolaPermitida = opts.consolaPermitida ?? [];
  const avisosPermitidos = opts.avisosPermitidos ?? [];
  const problemas: string[] = [];

  const alRechazo = (razon: unknown) => problemas.push(`unhandledRejection: ${describir(razon)}`);
  const alExcepcion = (error: unknown) => problemas.push(`uncaughtException: ${describir(error)}`);
  const alAviso = (aviso: Error) => {
    const texto = describir(aviso);
    if (!coincide(texto, avisosPermitidos)) problemas.push(`process.warning: ${texto}`);
  };

  function espiarConsola(metodo: 'warn' | 'error') {
    const original = console[metodo].bind(console);
    return vi.spyOn(console, metodo).mockImplementation((...args: unknown[]) => {
      const texto = args.map(describir).join(' ');
      if (!coincide(texto, consolaPermitida)) problemas.push(`console.${metodo}: ${texto}`);
      original(...args);
    });
  }

  let restaurarConsola: (() => void) | undefined;

  beforeAll(() => {
    if (revisarConsola) {
      const espias = [espiarConsola('warn'), espiarConsola('error')];
      restaurarConsola = () => espias.forEach((espia) => espia.mockRestore());
    }
    process.on('unhandledRejection', alRechazo);
    process.on('uncaughtException', alExcepcion);
    process.on('warning', alAviso);
  });

  afterEach(() => {
    const encontrados = problemas.splice(0, problemas.length);
    if (encontrados.length > 0) {
      throw new Error(`Fallo por warnings/errores en entorno de test: ${encontrados.slice(0, 3).join(' ; ')}`);
    }
  });

  afterAll(() => {
    process.off('unhandledRejection', alRechazo);
    process.off('uncaughtException', alExcepcion);
    process.off('warning', alAviso);
    restaurarConsola?.();
  });
}
