export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateError";
  }
}

export type TemplateValue = string | number | null;
export type TemplateValues = Readonly<Record<string, TemplateValue>>;

const PLACEHOLDER = /\{\{|\}\}|\{(\w+)(?::([^{}]*))?\}/g;
const FIXED_POINT = /^\.(\d+)f$/;

const formatValue = (value: TemplateValue, spec: string | undefined): string => {
  if (value === null) {
    return "";
  }
  const fixed = spec ? FIXED_POINT.exec(spec) : null;
  if (fixed?.[1] !== undefined) {
    const numeric = typeof value === "number" ? value : Number(value);
    return Number.isFinite(numeric) ? numeric.toFixed(Number(fixed[1])) : String(value);
  }
  return String(value);
};

/**
 * Fills `{field}` and `{field:.2f}` placeholders. `{{` and `}}` produce
 * literal braces.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(
    PLACEHOLDER,
    (match: string, name: string | undefined, spec: string | undefined) => {
      if (match === "{{") {
        return "{";
      }
      if (match === "}}") {
        return "}";
      }
      if (name === undefined || !Object.hasOwn(values, name)) {
        throw new TemplateError(`Template references unknown field "${name ?? match}"`);
      }
      return formatValue(values[name] ?? null, spec);
    },
  );
}
