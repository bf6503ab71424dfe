/**
 * Configuracion centralizada del backend de tareas.
 */
import dotenv from 'dotenv';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({ quiet: true });

const puerto = Number(process.env.PUERTO_API ?? process.env.PORT ?? 4000);
const mongoUri = process.env.MONGODB_URI ?? process.env.MONGO_URI ?? '';
const entorno = process.env.NODE_ENV ?? 'development';
const limiteJson = process.env.LIMITE_JSON ?? '1mb';
const coleccionTareas = (process.env.TAREAS_COLECCION ?? '').trim() || 'tareas';
const corsOrigenes = (process.env.CORS_ORIGENES ?? 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

function parsearNumeroSeguro(
  valor: unknown,
  porDefecto: number,
  { min, max }: { min?: number; max?: number } = {}
) {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

// Rate limit: configurable por entorno para tuning y para pruebas deterministas.
const rateLimitWindowMs = parsearNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = parsearNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 300, { min: 1, max: 10_000 });

export const configuracion = {
  puerto,
  mongoUri,
  entorno,
  limiteJson,
  coleccionTareas,
  corsOrigenes,
  rateLimitWindowMs,
  rateLimitLimit
};
