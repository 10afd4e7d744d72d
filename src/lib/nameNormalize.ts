import { repairEncoding } from './encodingRepair'

/**
 * Aggregation key for a person. Two spellings are the same person only when they are equal
 * after this step; there is no fuzzy matching.
 */
export function normalizeName(raw: string | null | undefined): string {
  const t = repairEncoding((raw || '').normalize('NFC'))
  // \s also covers tabs and NBSP
  return t.replace(/\s+/g, ' ').trim()
}
