import { ValueTransformer } from 'typeorm';
import { normalizeAmount } from '../utils/money.util';

/**
 * PostgreSQL hands decimals back as strings, SQLite as numbers. Entities
 * always see a two-digit decimal string.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: string | null | undefined) =>
    value === null || value === undefined ? value : normalizeAmount(value),
  from: (value: string | number | null) =>
    value === null ? null : normalizeAmount(value),
};
