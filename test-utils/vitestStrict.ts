import { afterAll, afterEach, beforeAll, vi } from 'vitest';

type OpcionesEndurecimiento = {
  /** Permite console.warn/error sin fallar (util para depurar). */
  permitirConsola?: boolean;
  /** Mensajes de consola tolerados (texto contenido o regex). */
  patronesConsola?: Array<string | RegExp>;
  /** Permite `process.warning` (DeprecationWarning, etc.). */
  permitirAvisosNode?: boolean;
  patronesAvisosNode?: Array<string | RegExp>;
};

function coincide(texto: string, patrones: Array<string | RegExp>): boolean {
  return patrones.some((patron) => (typeof patron === 'string' ? texto.includes(patron) : patron.test(texto)));
}

function describirArgumentos(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
      if (typeof arg === 'string') return arg;
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    })
    .join(' ');
}

function describirMotivo(motivo: unknown): string {
  return motivo instanceof Error ? `${motivo.name}: ${motivo.message}` : String(motivo);
}

/**
 * Endurece la suite de pruebas:
 * - Falla si hay `console.warn`/`console.error` no esperados (el logger esta
 *   silenciado en pruebas, asi que cualquier salida es un sintoma).
 * - Captura `unhandledRejection`, `uncaughtException` y `process.warning`.
 *
 * Se relaja con `ALLOW_TEST_CONSOLE=1` o `ALLOW_NODE_WARNINGS=1`.
 */
export function instalarTestHardening(opciones: OpcionesEndurecimiento = {}) {
  const permitirConsola = Boolean(opciones.permitirConsola) || process.env.ALLOW_TEST_CONSOLE === '1';
  const permitirAvisosNode = Boolean(opciones.permitirAvisosNode) || process.env.ALLOW_NODE_WARNINGS === '1';
  const patronesConsola = opciones.patronesConsola ?? [];
  const patronesAvisosNode = opciones.patronesAvisosNode ?? [];

  const salidaConsola: string[] = [];
  const sinManejar: string[] = [];
  const avisosNode: string[] = [];

  const alRechazoSinManejar = (motivo: unknown) => {
    sinManejar.push(`unhandledRejection: ${describirMotivo(motivo)}`);
  };
  const alExcepcionSinCapturar = (error: unknown) => {
    sinManejar.push(`uncaughtException: ${describirMotivo(error)}`);
  };
  const alAvisoNode = (aviso: Error) => {
    const texto = `${aviso.name}: ${aviso.message}`;
    if (!coincide(texto, patronesAvisosNode)) avisosNode.push(texto);
  };

  const restauraciones: Array<() => void> = [];

  beforeAll(() => {
    if (!permitirConsola) {
      for (const metodo of ['warn', 'error'] as const) {
        const original = console[metodo].bind(console);
        const espia = vi.spyOn(console, metodo).mockImplementation((...args: unknown[]) => {
          const texto = describirArgumentos(args);
          if (!coincide(texto, patronesConsola)) salidaConsola.push(`console.${metodo}: ${texto}`);
          // Mantener salida ayuda a diagnosticar fallos en CI.
          original(...args);
        });
        restauraciones.push(() => espia.mockRestore());
      }
    }

    process.on('unhandledRejection', alRechazoSinManejar);
    process.on('uncaughtException', alExcepcionSinCapturar);
    process.on('warning', alAvisoNode);
  });

  afterEach(() => {
    const problemas = [...salidaConsola, ...sinManejar];
    if (!permitirAvisosNode) problemas.push(...avisosNode.map((aviso) => `process.warning: ${aviso}`));

    salidaConsola.length = 0;
    sinManejar.length = 0;
    avisosNode.length = 0;

    if (problemas.length > 0) {
      throw new Error(`Fallo por warnings/errores en entorno de test: ${problemas.slice(0, 3).join(' | ')}`);
    }
  });

  afterAll(() => {
    process.off('unhandledRejection', alRechazoSinManejar);
    process.off('uncaughtException', alExcepcionSinCapturar);
    process.off('warning', alAvisoNode);
    for (const restaurar of restauraciones) restaurar();
  });
}
