export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servicio = 'api-tareas';

const prioridades: Record<NivelLog, number> = {
  info: 10,
  ok: 10,
  system: 10,
  warn: 20,
  error: 30
};

// `LOG_NIVEL` se lee en cada llamada para que las pruebas puedan ajustarlo.
function prioridadMinima(): number {
  const configurado = (process.env.LOG_NIVEL ?? '').trim().toLowerCase();
  const nivel = configurado || (process.env.NODE_ENV === 'test' ? 'silencio' : 'info');
  if (nivel === 'silencio') return Number.POSITIVE_INFINITY;
  if (nivel === 'warn' || nivel === 'error') return prioridades[nivel];
  return prioridades.info;
}

export function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { value: String(error) };
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  if (prioridades[level] < prioridadMinima()) return;

  const entry = {
    ts: new Date().toISOString(),
    service: servicio,
    level,
    msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}
