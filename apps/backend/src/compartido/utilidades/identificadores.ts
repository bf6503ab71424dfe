/**
 * Identificadores de tareas (UUID v4 en forma canonica).
 */
import { randomUUID } from 'node:crypto';

const PATRON_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type GeneradorId = () => string;

export const generarIdTarea: GeneradorId = () => randomUUID();

export function esUuidValido(valor: unknown): valor is string {
  return typeof valor === 'string' && PATRON_UUID.test(valor);
}

/** Forma en que los ids se guardan y se buscan. */
export function normalizarId(id: string): string {
  return id.toLowerCase();
}
