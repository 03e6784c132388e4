const amountFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

export const formatAmount = (value: number | null): string =>
  value === null ? 'n/a' : amountFormat.format(value);

export const formatRate = (value: number): string => `${value.toFixed(2)}%`;

/**
 * JSON for a `<script type="application/json">` block. `<` and the line
 * separators are escaped so the payload cannot close the element.
 */
export const serializeForScript = (value: unknown): string =>
  JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
