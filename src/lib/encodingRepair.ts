// Polish letters whose UTF-8 bytes were decoded as windows-1250. Bytes the code page leaves
// undefined (0x81, 0x83, 0x98) come through as the matching C1 control character.
const MOJIBAKE: ReadonlyArray<readonly [string, string]> = [
  ['Ä…', 'ą'],
  ['Ä„', 'Ą'],
  ['Ä‡', 'ć'],
  ['Ä†', 'Ć'],
  ['Ä™', 'ę'],
  ['Ä\u0098', 'Ę'],
  ['Ĺ‚', 'ł'],
  ['Ĺ\u0081', 'Ł'],
  ['Ĺ„', 'ń'],
  ['Ĺ\u0083', 'Ń'],
  ['Ăł', 'ó'],
  ['Ă³', 'ó'], // same bytes read as latin-1
  ['Ă“', 'Ó'],
  ['Ĺ›', 'ś'],
  ['Ĺš', 'Ś'],
  ['Ĺş', 'ź'],
  ['Ĺą', 'Ź'],
  ['ĹĽ', 'ż'],
  ['Ĺ»', 'Ż'],
]

const REPLACEMENTS = new Map(MOJIBAKE)

const PATTERN = new RegExp(
  [...MOJIBAKE]
    .map(([bad]) => bad)
    .sort((a, b) => b.length - a.length)
    .map(s => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('|'),
  'g'
)

// leftover C1 controls or U+FFFD mean the text was not the mojibake we know how to undo
const UNRESOLVED = /[\u0080-\u009f\ufffd]/

function replaceOnce(text: string): string {
  return text.replace(PATTERN, m => REPLACEMENTS.get(m) ?? m)
}

/**
 * Undoes the UTF-8-as-windows-1250 mis-decoding of Polish text.
 *
 * Runs to a fixed point, so `repairEncoding(repairEncoding(x)) === repairEncoding(x)`;
 * correct text has none of the sequences and is returned as is. When the result still has
 * undecodable characters the input is returned unchanged.
 */
export function repairEncoding(text: string): string {
  if (!text) return text
  let current = text
  for (;;) {
    const next = replaceOnce(current)
    if (next === current) break
    current = next
  }
  if (current !== text && UNRESOLVED.test(current)) return text
  return current
}
