// Helpers para inspeccionar `Resultado` en pruebas.
import type { FalloTarea, Resultado } from '../../src/compartido/tipos/resultado';

export function valorDe<T>(resultado: Resultado<T>): T {
  if (!resultado.ok) throw new Error(`Se esperaba exito y llego ${JSON.stringify(resultado.fallo)}`);
  return resultado.valor;
}

export function falloDe<T>(resultado: Resultado<T>): FalloTarea {
  if (resultado.ok) throw new Error(`Se esperaba un fallo y llego ${JSON.stringify(resultado.valor)}`);
  return resultado.fallo;
}

export function mensajeDe<T>(resultado: Resultado<T>): string {
  const fallo = falloDe(resultado);
  if (fallo.tipo !== 'VALIDACION') throw new Error(`Se esperaba VALIDACION y llego ${fallo.tipo}`);
  return fallo.mensaje;
}
