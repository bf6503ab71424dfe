/**
 * Fechas ISO 8601 en UTC.
 *
 * Las marcas de tiempo del API se guardan con precision de segundos y sufijo
 * `Z`. Al parsear, un valor sin zona horaria se interpreta como UTC.
 */
export type Reloj = () => Date;

export const relojSistema: Reloj = () => new Date();

const PATRON_ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const PATRON_ZONA = /^([+-])(\d{2}):?(\d{2})$/;

function esBisiesto(anio: number) {
  return (anio % 4 === 0 && anio % 100 !== 0) || anio % 400 === 0;
}

function diasEnMes(anio: number, mes: number) {
  const dias = [31, esBisiesto(anio) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return dias[mes - 1] ?? 0;
}

function desfaseMinutos(zona: string): number | null {
  if (zona === 'Z') return 0;
  const partes = PATRON_ZONA.exec(zona);
  if (!partes) return null;
  const [, signo, horas, minutos] = partes;
  const h = Number(horas);
  const m = Number(minutos);
  if (h > 23 || m > 59) return null;
  return (signo === '-' ? -1 : 1) * (h * 60 + m);
}

/**
 * Parsea `YYYY-MM-DD[THH:MM[:SS[.ffffff]]][Z|±HH:MM]`. Devuelve `null` si el
 * texto no tiene ese formato o describe una fecha inexistente (p. ej. 31 de abril).
 */
export function parsearIso8601(texto: string): Date | null {
  const partes = PATRON_ISO_8601.exec(texto);
  if (!partes) return null;

  const [, anioTxt, mesTxt, diaTxt, horaTxt = '00', minutoTxt = '00', segundoTxt = '00', fraccion = '', zona = 'Z'] =
    partes;
  const anio = Number(anioTxt);
  const mes = Number(mesTxt);
  const dia = Number(diaTxt);
  const hora = Number(horaTxt);
  const minuto = Number(minutoTxt);
  const segundo = Number(segundoTxt);

  if (mes < 1 || mes > 12) return null;
  if (dia < 1 || dia > diasEnMes(anio, mes)) return null;
  if (hora > 23 || minuto > 59 || segundo > 59) return null;

  const desfase = desfaseMinutos(zona);
  if (desfase === null) return null;

  const milisegundos = Number(`${fraccion}000`.slice(0, 3));
  const fecha = new Date(0);
  // setUTCFullYear evita el corrimiento de Date.UTC para anios < 100.
  fecha.setUTCFullYear(anio, mes - 1, dia);
  fecha.setUTCHours(hora, minuto, segundo, milisegundos);
  return new Date(fecha.getTime() - desfase * 60_000);
}

export function formatearIso8601(fecha: Date): string {
  return fecha.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function ahoraIso8601(reloj: Reloj = relojSistema): string {
  return formatearIso8601(reloj());
}
