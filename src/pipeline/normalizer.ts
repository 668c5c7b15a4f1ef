import type { CanonicalRecord, RawRecord } from '../types/record.js';
import { TEXT_DEFAULTS } from '../types/record.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import {
  normalizeText,
  parseCoordinate,
  parseCount,
  parsePriceCents,
  parseProductId,
  parsePurchaseDate,
  parseShippingCents,
  type FieldResult,
} from './fields.js';

/** Source values picked out of a raw record, before any coercion. */
interface SelectedFields {
  id: unknown;
  product_name: unknown;
  category_name: unknown;
  price: unknown;
  shipping: unknown;
  purchase_date: unknown;
  seller_name: unknown;
  purchase_location_code: unknown;
  purchase_rating: unknown;
  payment_type: unknown;
  installments_quantity: unknown;
  latitude: unknown;
  longitude: unknown;
}

type FieldResults = {
  [K in Exclude<keyof CanonicalRecord, 'etl_load_timestamp'>]: FieldResult<CanonicalRecord[K]>;
};

function selectFields(raw: RawRecord): SelectedFields {
  return {
    id: raw['id'],
    product_name: raw['Produto'],
    category_name: raw['Categoria do Produto'],
    price: raw['Preço'],
    shipping: raw['Frete'],
    purchase_date: raw['Data da Compra'],
    seller_name: raw['Vendedor'],
    purchase_location_code: raw['Local da compra'],
    purchase_rating: raw['Avaliação da compra'],
    payment_type: raw['Tipo de pagamento'],
    installments_quantity: raw['Quantidade de parcelas'],
    latitude: raw['lat'],
    longitude: raw['lon'],
  };
}

/** Runs every field through its parser; one field's failure never touches another. */
export function coerceFields(raw: RawRecord): FieldResults {
  const s = selectFields(raw);
  return {
    product_id: parseProductId(s.id),
    product_name: normalizeText(s.product_name, TEXT_DEFAULTS.product_name),
    category_name: normalizeText(s.category_name, TEXT_DEFAULTS.category_name),
    price_cents: parsePriceCents(s.price),
    shipping_cost_cents: parseShippingCents(s.shipping),
    purchase_date: parsePurchaseDate(s.purchase_date),
    seller_name: normalizeText(s.seller_name, TEXT_DEFAULTS.seller_name),
    purchase_location_code: normalizeText(s.purchase_location_code, TEXT_DEFAULTS.purchase_location_code),
    purchase_rating: parseCount(s.purchase_rating, 'purchase rating'),
    payment_type: normalizeText(s.payment_type, TEXT_DEFAULTS.payment_type),
    installments_quantity: parseCount(s.installments_quantity, 'installments quantity'),
    latitude: parseCoordinate(s.latitude, 'latitude'),
    longitude: parseCoordinate(s.longitude, 'longitude'),
  };
}

/**
 * Normalize one raw sale into the canonical shape. Never throws on bad data:
 * unusable values become null or the field's sentinel and are logged.
 */
export function normalizeRecord(
  raw: RawRecord,
  loadedAt: Date,
  log: Logger = rootLogger,
): CanonicalRecord {
  const r = coerceFields(raw);

  const product = r.product_id.value ?? r.product_name.value;
  for (const [field, result] of Object.entries(r)) {
    if (result.kind === 'defaulted' && result.reason) {
      log.warn({ field, product, reason: result.reason }, 'Field defaulted during normalization');
    }
  }

  return {
    product_id: r.product_id.value,
    product_name: r.product_name.value,
    category_name: r.category_name.value,
    price_cents: r.price_cents.value,
    shipping_cost_cents: r.shipping_cost_cents.value,
    purchase_date: r.purchase_date.value,
    seller_name: r.seller_name.value,
    purchase_location_code: r.purchase_location_code.value,
    purchase_rating: r.purchase_rating.value,
    payment_type: r.payment_type.value,
    installments_quantity: r.installments_quantity.value,
    latitude: r.latitude.value,
    longitude: r.longitude.value,
    etl_load_timestamp: loadedAt,
  };
}
