/**
 * Helpers de validacion con Zod.
 *
 * Se reporta solo el primer problema: el orden de los campos en el esquema
 * define que mensaje ve el cliente.
 */
import type { ZodTypeAny, output } from 'zod';
import { exito, falloValidacion } from '../tipos/resultado';
import type { Resultado } from '../tipos/resultado';

export function validarConEsquema<S extends ZodTypeAny>(esquema: S, datos: unknown): Resultado<output<S>> {
  const resultado = esquema.safeParse(datos);
  if (!resultado.success) {
    const [primero] = resultado.error.issues;
    return falloValidacion(primero?.message ?? 'Payload invalido');
  }
  return exito(resultado.data);
}

export function esObjetoPlano(valor: unknown): valor is Record<string, unknown> {
  return typeof valor === 'object' && valor !== null && !Array.isArray(valor);
}
