const SCALE_DELIMITERS = ['*', '×'];

function formatScaled(value: number): string {
  return value >= 0.01 ? value.toFixed(2) : value.toFixed(4);
}

/**
 * Multiplies every number of a dimension string by `multiplier`.
 * Example: scaleDimensions("0.5*1*2", 2) -> "1.00 * 2.00 * 4.00"
 *
 * The original delimiter is kept (padded with spaces); whitespace-only
 * strings use a single space. An unparseable base is returned unchanged.
 */
export function scaleDimensions(base: string, multiplier: number): string {
  if (!base || base.trim() === '') {
    return '';
  }

  let normalized = base;
  for (const delimiter of SCALE_DELIMITERS) {
    normalized = normalized.split(delimiter).join(' ');
  }
  const parts = normalized.split(/\s+/).filter(part => part !== '');
  const numbers = parts.map(Number);
  if (numbers.length === 0 || numbers.some(n => !Number.isFinite(n))) {
    return base;
  }

  const delimiter = SCALE_DELIMITERS.find(d => base.includes(d));
  const separator = delimiter ? ` ${delimiter} ` : ' ';
  return numbers.map(n => formatScaled(n * multiplier)).join(separator);
}
