/**
 * Normalizacion de numeros que provienen del almacen.
 *
 * MongoDB serializa `Decimal128` como `{ $numberDecimal: '12.50' }`. En la
 * respuesta se emite como numero JSON: entero si no tiene parte decimal y
 * flotante en otro caso.
 */
function esDecimalSerializado(valor: unknown): valor is { $numberDecimal: string } {
  if (typeof valor !== 'object' || valor === null) return false;
  const claves = Object.keys(valor);
  return claves.length === 1 && claves[0] === '$numberDecimal' && typeof Reflect.get(valor, '$numberDecimal') === 'string';
}

export function decimalANumero(texto: string): number {
  // '3.00' -> 3, '2.50' -> 2.5
  return Number(texto);
}

/**
 * Replacer para `JSON.stringify` (Express `json replacer`).
 */
export function reemplazarDecimales(_clave: string, valor: unknown): unknown {
  if (esDecimalSerializado(valor)) return decimalANumero(valor.$numberDecimal);
  if (typeof valor === 'bigint') return Number(valor);
  return valor;
}
