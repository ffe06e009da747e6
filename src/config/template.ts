/**
 * Template Expansion
 *
 * Substitutes `{name}` and `{name:spec}` placeholders with values from a
 * lookup function. `{{` and `}}` produce literal braces. The format spec
 * accepts `[[fill]align][sign][0][width][,][.precision][type]`.
 */

import { TemplateError } from '../core/errors.js';

/**
 * Value source for placeholders. Returns undefined for unknown names.
 */
export type TemplateLookup = (key: string) => string | number | undefined;

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

const SPEC_PATTERN =
  /^(?:(.)?([<>^=]))?([+\- ])?(0)?(\d+)?(,)?(?:\.(\d+))?([sdxXobf])?$/;

/**
 * Parsed format spec
 */
interface FormatSpec {
  fill: string;
  align?: '<' | '>' | '^' | '=';
  sign?: '+' | '-' | ' ';
  width: number;
  grouping: boolean;
  precision?: number;
  type?: 's' | 'd' | 'x' | 'X' | 'o' | 'b' | 'f';
}

/**
 * Expand every placeholder in a template.
 *
 * @param template - Text containing placeholders
 * @param lookup - Value source for placeholder names
 * @returns Expanded text
 * @throws TemplateError for unknown names or malformed placeholders
 */
export function expandTemplate(template: string, lookup: TemplateLookup): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const ch = template.charAt(i);

    if (ch === '{') {
      if (template[i + 1] === '{') {
        result += '{';
        i += 2;
        continue;
      }
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        throw new TemplateError(
          `Unmatched '{' in template: ${template}`,
          'TEMPLATE_INVALID',
          template
        );
      }
      result += expandField(template.slice(i + 1, close), template, lookup);
      i = close + 1;
      continue;
    }

    if (ch === '}') {
      if (template[i + 1] === '}') {
        result += '}';
        i += 2;
        continue;
      }
      throw new TemplateError(
        `Single '}' encountered in template: ${template}`,
        'TEMPLATE_INVALID',
        template
      );
    }

    result += ch;
    i++;
  }

  return result;
}

function expandField(field: string, template: string, lookup: TemplateLookup): string {
  const colon = field.indexOf(':');
  const name = colon === -1 ? field : field.slice(0, colon);
  const specText = colon === -1 ? '' : field.slice(colon + 1);

  if (!NAME_PATTERN.test(name)) {
    throw new TemplateError(
      `Invalid placeholder '{${field}}' in template: ${template}`,
      'TEMPLATE_INVALID',
      name
    );
  }

  const value = lookup(name);
  if (value === undefined) {
    throw new TemplateError(
      `Unknown template key '${name}' in template: ${template}`,
      'TEMPLATE_KEY_MISSING',
      name
    );
  }

  return formatValue(value, parseSpec(specText, name), name);
}

function parseSpec(specText: string, name: string): FormatSpec {
  const match = SPEC_PATTERN.exec(specText);
  if (!match) {
    throw new TemplateError(
      `Invalid format spec '${specText}' for key '${name}'`,
      'TEMPLATE_INVALID',
      name
    );
  }

  const [, fill, align, sign, zero, width, grouping, precision, type] = match;
  const spec: FormatSpec = {
    fill: fill ?? ' ',
    width: width ? Number.parseInt(width, 10) : 0,
    grouping: grouping === ',',
  };

  if (align === '<' || align === '>' || align === '^' || align === '=') {
    spec.align = align;
  }
  if (sign === '+' || sign === '-' || sign === ' ') {
    spec.sign = sign;
  }
  if (zero && !align) {
    spec.fill = '0';
    spec.align = '=';
  }
  if (precision !== undefined) {
    spec.precision = Number.parseInt(precision, 10);
  }
  if (
    type === 's' ||
    type === 'd' ||
    type === 'x' ||
    type === 'X' ||
    type === 'o' ||
    type === 'b' ||
    type === 'f'
  ) {
    spec.type = type;
  }

  return spec;
}

function formatValue(value: string | number, spec: FormatSpec, name: string): string {
  const numeric =
    spec.type !== undefined && spec.type !== 's'
      ? toNumber(value, name)
      : undefined;

  if (numeric === undefined) {
    let text = String(value);
    if (spec.precision !== undefined) {
      text = text.slice(0, spec.precision);
    }
    return pad(text, '', spec, typeof value === 'number' ? '>' : '<');
  }

  const negative = numeric < 0;
  const magnitude = Math.abs(numeric);
  let digits: string;

  switch (spec.type) {
    case 'x':
      digits = Math.trunc(magnitude).toString(16);
      break;
    case 'X':
      digits = Math.trunc(magnitude).toString(16).toUpperCase();
      break;
    case 'o':
      digits = Math.trunc(magnitude).toString(8);
      break;
    case 'b':
      digits = Math.trunc(magnitude).toString(2);
      break;
    case 'f':
      digits = magnitude.toFixed(spec.precision ?? 6);
      break;
    default:
      if (!Number.isInteger(numeric)) {
        throw new TemplateError(
          `Value '${String(value)}' for key '${name}' is not an integer`,
          'TEMPLATE_INVALID',
          name
        );
      }
      digits = String(magnitude);
  }

  if (spec.grouping) {
    const [whole = '', fraction] = digits.split('.');
    const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
    digits = fraction === undefined ? grouped : `${grouped}.${fraction}`;
  }

  let signText = '';
  if (negative) {
    signText = '-';
  } else if (spec.sign === '+') {
    signText = '+';
  } else if (spec.sign === ' ') {
    signText = ' ';
  }

  return pad(digits, signText, spec, '>');
}

function toNumber(value: string | number, name: string): number {
  if (typeof value === 'number') {
    return value;
  }
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || Number.isNaN(parsed)) {
    throw new TemplateError(
      `Value '${value}' for key '${name}' is not numeric`,
      'TEMPLATE_INVALID',
      name
    );
  }
  return parsed;
}

function pad(
  body: string,
  signText: string,
  spec: FormatSpec,
  defaultAlign: '<' | '>'
): string {
  const length = signText.length + body.length;
  const padding = Math.max(0, spec.width - length);
  if (padding === 0) {
    return signText + body;
  }

  const fill = spec.fill.repeat(padding);
  switch (spec.align ?? defaultAlign) {
    case '<':
      return signText + body + fill;
    case '^': {
      const left = Math.floor(padding / 2);
      return (
        spec.fill.repeat(left) + signText + body + spec.fill.repeat(padding - left)
      );
    }
    case '=':
      return signText + fill + body;
    default:
      return fill + signText + body;
  }
}
