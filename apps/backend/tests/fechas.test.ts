import { describe, expect, it } from 'vitest';
import { ahoraIso8601, formatearIso8601, parsearIso8601 } from '../src/compartido/utilidades/fechas';

describe('fechas ISO 8601', () => {
  it('formatea en UTC con precision de segundos y sufijo Z', () => {
    expect(formatearIso8601(new Date(Date.UTC(2025, 0, 31, 12, 30, 45, 987)))).toBe('2025-01-31T12:30:45Z');
  });

  it('usa el reloj inyectado para el momento actual', () => {
    expect(ahoraIso8601(() => new Date('2025-06-01T10:00:00.400Z'))).toBe('2025-06-01T10:00:00Z');
  });

  it('interpreta valores sin zona horaria como UTC', () => {
    expect(parsearIso8601('2025-03-01T08:15:00')?.toISOString()).toBe('2025-03-01T08:15:00.000Z');
    expect(parsearIso8601('2025-03-01T08:15')?.toISOString()).toBe('2025-03-01T08:15:00.000Z');
    expect(parsearIso8601('2025-03-01')?.toISOString()).toBe('2025-03-01T00:00:00.000Z');
  });

  it('aplica el desfase de zona horaria y fracciones de segundo', () => {
    expect(parsearIso8601('2025-03-01T08:15:00-06:00')?.toISOString()).toBe('2025-03-01T14:15:00.000Z');
    expect(parsearIso8601('2025-03-01T08:15:00+0130')?.toISOString()).toBe('2025-03-01T06:45:00.000Z');
    expect(parsearIso8601('2025-03-01T08:15:00.5Z')?.toISOString()).toBe('2025-03-01T08:15:00.500Z');
    expect(parsearIso8601('2025-03-01 08:15:00.123456')?.toISOString()).toBe('2025-03-01T08:15:00.123Z');
  });

  it('acepta el 29 de febrero solo en anios bisiestos', () => {
    expect(parsearIso8601('2024-02-29T00:00:00Z')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(parsearIso8601('2023-02-29T00:00:00Z')).toBeNull();
    expect(parsearIso8601('1900-02-29')).toBeNull();
    expect(parsearIso8601('2000-02-29')?.toISOString()).toBe('2000-02-29T00:00:00.000Z');
  });

  it('rechaza textos mal formados o fechas inexistentes', () => {
    const invalidos = [
      '',
      'mañana',
      '2025/01/01',
      '01-06-2025',
      '2025-13-01',
      '2025-04-31',
      '2025-01-01T24:00:00',
      '2025-01-01T10:60:00',
      '2025-01-01T10:00:00+25:00',
      '2025-01-01T10:00:00Zextra'
    ];
    for (const texto of invalidos) {
      expect(parsearIso8601(texto)).toBeNull();
    }
  });
});
