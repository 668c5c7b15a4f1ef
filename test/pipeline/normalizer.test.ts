import { describe, it, expect } from 'vitest';
import { coerceFields, normalizeRecord } from '../../src/pipeline/normalizer.js';
import { CANONICAL_FIELDS } from '../../src/types/record.js';
import { captureLogger, WARN } from '../helpers/capture-logger.js';

const loadedAt = new Date('2024-03-06T12:00:00.000Z');

describe('normalizeRecord', () => {
  it('should fill defaults around the few fields a sparse record carries', () => {
    const { log } = captureLogger();
    const record = normalizeRecord(
      {
        id: '',
        Produto: ' Mouse ',
        'Preço': '49.9',
        Frete: 'R$ 7,50 frete',
        'Data da Compra': '05/03/2024',
      },
      loadedAt,
      log,
    );

    expect(record).toEqual({
      product_id: null,
      product_name: 'mouse',
      category_name: 'outros',
      price_cents: 4990,
      shipping_cost_cents: 700,
      purchase_date: '2024-03-05',
      seller_name: 'vendedor desconhecido',
      purchase_location_code: 'n/a',
      purchase_rating: null,
      payment_type: 'não especificado',
      installments_quantity: null,
      latitude: null,
      longitude: null,
      etl_load_timestamp: loadedAt,
    });
  });

  it('should always produce exactly the canonical fields', () => {
    const { log } = captureLogger();
    const fromEmpty = normalizeRecord({}, loadedAt, log);
    const fromNoisy = normalizeRecord({ Produto: 'x', extra: 1, nested: { a: 1 } }, loadedAt, log);

    expect(Object.keys(fromEmpty).sort()).toEqual([...CANONICAL_FIELDS].sort());
    expect(Object.keys(fromNoisy).sort()).toEqual([...CANONICAL_FIELDS].sort());
  });

  it('should not warn about absent fields', () => {
    const { log, lines } = captureLogger();
    normalizeRecord({}, loadedAt, log);
    expect(lines).toEqual([]);
  });

  it('should warn once per unusable field, naming the record', () => {
    const { log, lines } = captureLogger();
    const record = normalizeRecord(
      { id: 7, Produto: 'Teclado', 'Preço': 'abc', 'Avaliação da compra': 'ótima', lat: 'norte' },
      loadedAt,
      log,
    );

    expect(record.price_cents).toBeNull();
    expect(record.purchase_rating).toBeNull();
    expect(record.latitude).toBeNull();
    expect(lines.map((l) => [l.level, l['field'], l['product'], l['reason']])).toEqual([
      [WARN, 'price_cents', '7', "invalid price 'abc'"],
      [WARN, 'purchase_rating', '7', "invalid purchase rating 'ótima'"],
      [WARN, 'latitude', '7', "invalid latitude 'norte'"],
    ]);
    expect(lines.every((l) => l.msg === 'Field defaulted during normalization')).toBe(true);
  });

  it('should name the record by product when it has no id', () => {
    const { log, lines } = captureLogger();
    normalizeRecord({ Produto: 'Teclado', Frete: 'grátis' }, loadedAt, log);
    expect(lines).toHaveLength(1);
    expect(lines[0]?.['product']).toBe('teclado');
  });
});

describe('coerceFields', () => {
  it('should keep one bad field from affecting its neighbours', () => {
    const r = coerceFields({
      'Preço': 'caro',
      Frete: '15',
      'Quantidade de parcelas': '3',
      lon: '-48.79',
    });

    expect(r.price_cents.kind).toBe('defaulted');
    expect(r.shipping_cost_cents).toEqual({ kind: 'value', value: 1500 });
    expect(r.installments_quantity).toEqual({ kind: 'value', value: 3 });
    expect(r.longitude).toEqual({ kind: 'value', value: -48.79 });
  });

  it('should not treat booleans as numbers', () => {
    const r = coerceFields({ 'Preço': true, 'Avaliação da compra': false });
    expect(r.price_cents).toEqual({ kind: 'defaulted', value: null, reason: 'invalid price true' });
    expect(r.purchase_rating).toEqual({
      kind: 'defaulted',
      value: null,
      reason: 'invalid purchase rating false',
    });
  });
});
