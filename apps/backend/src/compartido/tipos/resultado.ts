/**
 * Resultado explicito de las operaciones del nucleo (validacion, almacen,
 * consultas). Ninguna de ellas lanza por datos invalidos o ausencia.
 */
export type FalloTarea =
  | { readonly tipo: 'VALIDACION'; readonly mensaje: string }
  | { readonly tipo: 'NO_ENCONTRADO'; readonly id: string }
  | { readonly tipo: 'ALMACEN'; readonly causa: unknown };

export type Resultado<T> =
  | { readonly ok: true; readonly valor: T }
  | { readonly ok: false; readonly fallo: FalloTarea };

export const exito = <T>(valor: T): Resultado<T> => ({ ok: true, valor });

export const fallar = (fallo: FalloTarea): Resultado<never> => ({ ok: false, fallo });

export const falloValidacion = (mensaje: string) => fallar({ tipo: 'VALIDACION', mensaje });

export const falloNoEncontrado = (id: string) => fallar({ tipo: 'NO_ENCONTRADO', id });

export const falloAlmacen = (causa: unknown) => fallar({ tipo: 'ALMACEN', causa });
