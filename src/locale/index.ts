import fa from './fa.json';

export const t = fa;

/** Fills `{name}` placeholders; unknown placeholders are left as written. */
export const interpolate = (template: string, values: Record<string, string | number>): string =>
  template.replace(/\{(\w+)\}/g, (match, key: string) => (key in values ? String(values[key]) : match));
