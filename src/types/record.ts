/** A sale exactly as the upstream API returned it. Labels are Portuguese, values untyped. */
export type RawRecord = Record<string, unknown>;

/** ISO calendar date, e.g. '2024-03-05' */
export type IsoDate = string;

/** The fixed fourteen-field shape every raw sale is normalized into. */
export interface CanonicalRecord {
  product_id: string | null;
  product_name: string;
  category_name: string;
  price_cents: number | null;
  shipping_cost_cents: number | null;
  purchase_date: IsoDate | null;
  seller_name: string;
  purchase_location_code: string;
  purchase_rating: number | null;
  payment_type: string;
  installments_quantity: number | null;
  latitude: number | null;
  longitude: number | null;
  /** Same instant for every record of one batch. */
  etl_load_timestamp: Date;
}

export type CanonicalField = keyof CanonicalRecord;

/** Staging column order. Matches sql/schema/00_create_staging_table.sql. */
export const CANONICAL_FIELDS = [
  'product_id',
  'product_name',
  'category_name',
  'price_cents',
  'shipping_cost_cents',
  'purchase_date',
  'seller_name',
  'purchase_location_code',
  'purchase_rating',
  'payment_type',
  'installments_quantity',
  'latitude',
  'longitude',
  'etl_load_timestamp',
] as const satisfies readonly CanonicalField[];

export type TextField =
  | 'product_name'
  | 'category_name'
  | 'seller_name'
  | 'purchase_location_code'
  | 'payment_type';

export const TEXT_DEFAULTS: Readonly<Record<TextField, string>> = {
  product_name: 'nome indisponível',
  category_name: 'outros',
  seller_name: 'vendedor desconhecido',
  purchase_location_code: 'n/a',
  payment_type: 'não especificado',
};
