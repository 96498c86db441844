/**
 * Configuracion centralizada del panel.
 */
import dotenv from 'dotenv';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({ quiet: true });

export type ConfiguracionPanel = {
  apiBaseUrl: string;
  token: string;
  rutaResultados: string;
  tiempoEsperaMs: number;
  profundidadMaximaJson: number;
  entorno: string;
};

export function parsearNumeroSeguro(valor: unknown, porDefecto: number, { min, max }: { min?: number; max?: number } = {}) {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

export function leerConfiguracion(env: NodeJS.ProcessEnv = process.env): ConfiguracionPanel {
  const apiBaseUrl = (env.API_BASE_URL ?? '').trim() || 'http://localhost:5000';
  const token = env.TOKEN ?? '';
  const rutaResultados = (env.RUTA_RESULTADOS ?? '').trim() || '/resultados';
  const entorno = env.NODE_ENV ?? 'development';

  // Timeout por solicitud; al vencer se reporta como error de conexion.
  const tiempoEsperaMs = parsearNumeroSeguro(env.TIEMPO_ESPERA_MS, 12_000, { min: 1_000, max: 120_000 });

  // Cota de anidamiento al decodificar respuestas JSON del backend.
  const profundidadMaximaJson = parsearNumeroSeguro(env.PROFUNDIDAD_MAXIMA_JSON, 100, { min: 1, max: 1_000 });

  return Object.freeze({
    apiBaseUrl,
    token,
    rutaResultados,
    tiempoEsperaMs,
    profundidadMaximaJson,
    entorno
  });
}

export const configuracion = leerConfiguracion();
