const INTEGER_TEXT = /^-?\d+$/;

/**
 * Read the decimal text of a stored number. Integers beyond double precision
 * stay exact as bigint; everything else becomes a double.
 */
export const parseNumberText = (text: string): number | bigint => {
  const value = Number(text);
  if (INTEGER_TEXT.test(text) && !Number.isSafeInteger(value)) {
    return BigInt(text);
  }
  return value;
};

/**
 * `JSON.stringify` that writes bigints as bare JSON numbers with every digit.
 * Object members holding `undefined` are dropped, as `JSON.stringify` does.
 */
export const stringifyJson = (value: unknown): string => {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : stringifyJson(item))).join(',')}]`;
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const members: string[] = [];
    for (const [key, member] of Object.entries(value)) {
      if (member === undefined) continue;
      members.push(`${JSON.stringify(key)}:${stringifyJson(member)}`);
    }
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
};
