import { DuplicateColumnError } from '@errors';
import { sanitizeColumnName, sanitizeColumns, sanitizeTableName } from '@sanitize/index';

const samples = [
  '',
  '!!!',
  '123abc',
  '  Ventas__2024--Ano  .csv',
  '/tmp/in/Clientes 2024.csv',
  '__weird__.xlsx',
  'Über Größe.xls',
  '9',
  '.csv',
  'a.b.c',
  'tab\tseparated name',
];

describe('sanitizeTableName', () => {
  it('falls back to "table" when nothing valid is left', () => {
    expect(sanitizeTableName('')).toBe('table');
    expect(sanitizeTableName('!!!')).toBe('table');
    expect(sanitizeTableName('!!!!.csv')).toBe('table');
  });

  it('prefixes names that start with a digit', () => {
    expect(sanitizeTableName('123abc')).toBe('t_123abc');
    expect(sanitizeTableName('123.csv')).toBe('t_123');
  });

  it('strips directory and extension before normalizing', () => {
    expect(sanitizeTableName('  Ventas__2024--Ano  .csv')).toBe('ventas_2024_ano');
    expect(sanitizeTableName('/tmp/in/Clientes 2024.csv')).toBe('clientes_2024');
    expect(sanitizeTableName('report.final.xlsx')).toBe('report_final');
    expect(sanitizeTableName('.csv')).toBe('csv');
  });

  it('replaces non-ASCII letters after lower-casing', () => {
    expect(sanitizeTableName('Ventas 2024-Año.csv')).toBe('ventas_2024_a_o');
    expect(sanitizeTableName('İstanbul.csv')).toBe('i_stanbul');
  });

  it('always yields a valid, stable identifier', () => {
    samples.forEach((sample) => {
      const name = sanitizeTableName(sample);
      expect(name).toMatch(/^[a-z][a-z0-9_]*$/);
      expect(name).not.toMatch(/__|_$/);
      expect(sanitizeTableName(name)).toBe(name);
    });
  });
});

describe('sanitizeColumnName', () => {
  it('normalizes headers', () => {
    expect(sanitizeColumnName('Nombre')).toBe('nombre');
    expect(sanitizeColumnName('Código Postal')).toBe('c_digo_postal');
    expect(sanitizeColumnName('  Fecha de Venta ')).toBe('fecha_de_venta');
    expect(sanitizeColumnName('A__B')).toBe('a_b');
  });

  it('uses "col" as the empty fallback', () => {
    expect(sanitizeColumnName('')).toBe('col');
    expect(sanitizeColumnName('%%')).toBe('col');
  });

  it('prefixes leading digits', () => {
    expect(sanitizeColumnName('2024 Total')).toBe('t_2024_total');
  });

  it('matches invalid characters before lower-casing', () => {
    expect(sanitizeColumnName('İstanbul')).toBe('stanbul');
  });

  it('is idempotent', () => {
    samples.forEach((sample) => {
      const name = sanitizeColumnName(sample);
      expect(name).toMatch(/^[a-z][a-z0-9_]*$/);
      expect(sanitizeColumnName(name)).toBe(name);
    });
  });
});

describe('identifier length', () => {
  it('fits names into 63 characters', () => {
    expect(sanitizeTableName(`${'x'.repeat(100)}.csv`)).toBe('x'.repeat(63));
    expect(sanitizeColumnName('y'.repeat(80))).toBe('y'.repeat(63));
  });

  it('drops an underscore left at the cut', () => {
    expect(sanitizeColumnName(`${'a'.repeat(62)} b`)).toBe('a'.repeat(62));
  });
});

describe('sanitizeColumns', () => {
  it('keeps suffixed long names distinct after truncation', () => {
    const header = 'h'.repeat(70);
    const columns = sanitizeColumns([header, header, `${header}!`]);
    expect(columns).toEqual(['h'.repeat(63), `${'h'.repeat(61)}_2`, `${'h'.repeat(61)}_3`]);
    columns.forEach((column) => expect(column.length).toBeLessThanOrEqual(63));
  });


  it('suffixes collisions in header order', () => {
    expect(sanitizeColumns(['A-B', 'A_B', 'a b', 'c'])).toEqual(['a_b', 'a_b_2', 'a_b_3', 'c']);
  });

  it('skips suffixes that are already taken', () => {
    expect(sanitizeColumns(['x', 'x', 'x_2'])).toEqual(['x', 'x_2', 'x_2_2']);
  });

  it('fails on collisions with the fail policy', () => {
    expect(() => sanitizeColumns(['id', 'A-B', 'A_B'], 'fail')).toThrow(DuplicateColumnError);
    try {
      sanitizeColumns(['id', 'A-B', 'A_B'], 'fail');
    } catch (err) {
      expect(err).toBeInstanceOf(DuplicateColumnError);
      if (err instanceof DuplicateColumnError) {
        expect(err.column).toBe('a_b');
        expect(err.details).toEqual({ headers: ['A-B', 'A_B'] });
      }
    }
  });

  it('leaves distinct headers untouched with the fail policy', () => {
    expect(sanitizeColumns(['Nombre', 'Código Postal'], 'fail')).toEqual(['nombre', 'c_digo_postal']);
  });
});
