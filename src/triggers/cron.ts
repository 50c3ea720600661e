/**
 * Five-field cron validation (POSIX syntax, as accepted by scheduled workflows)
 */

interface CronField {
  name: string;
  min: number;
  max: number;
  aliases?: string[];
}

const FIELDS: CronField[] = [
  { name: 'minute', min: 0, max: 59 },
  { name: 'hour', min: 0, max: 23 },
  { name: 'day of month', min: 1, max: 31 },
  {
    name: 'month',
    min: 1,
    max: 12,
    aliases: ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC']
  },
  { name: 'day of week', min: 0, max: 6, aliases: ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] }
];

function parseValue(raw: string, field: CronField): number | null {
  if (/^\d+$/.test(raw)) {
    return Number(raw);
  }
  const aliasIndex = field.aliases?.indexOf(raw.toUpperCase()) ?? -1;
  if (aliasIndex === -1) {
    return null;
  }
  return field.min + aliasIndex;
}

function validateItem(item: string, field: CronField): string | null {
  const [range, step, ...extra] = item.split('/');
  if (extra.length > 0) {
    return `too many "/" in ${field.name} "${item}"`;
  }
  if (step !== undefined && !/^[1-9]\d*$/.test(step)) {
    return `invalid step "${step}" in ${field.name}`;
  }
  if (range === '*') {
    return null;
  }

  const bounds = range.split('-');
  if (bounds.length > 2) {
    return `invalid range "${range}" in ${field.name}`;
  }
  const values: number[] = [];
  for (const bound of bounds) {
    const value = parseValue(bound, field);
    if (value === null) {
      return `invalid value "${bound}" in ${field.name}`;
    }
    if (value < field.min || value > field.max) {
      return `${field.name} value ${value} out of range ${field.min}-${field.max}`;
    }
    values.push(value);
  }
  if (values.length === 2 && values[0] > values[1]) {
    return `${field.name} range "${range}" is reversed`;
  }
  if (values.length === 1 && step !== undefined) {
    return `step requires a range or "*" in ${field.name}`;
  }
  return null;
}

/**
 * Validate a cron expression
 * @param expression - e.g. "0 4 * * *"
 * @returns null when valid, otherwise a description of the first problem
 */
export function validateCron(expression: string): string | null {
  const parts = expression.trim().split(/\s+/);
  if (parts.length !== FIELDS.length) {
    return `expected ${FIELDS.length} fields, got ${parts[0] === '' ? 0 : parts.length}`;
  }

  for (let i = 0; i < FIELDS.length; i++) {
    for (const item of parts[i].split(',')) {
      if (item.length === 0) {
        return `empty list item in ${FIELDS[i].name}`;
      }
      const problem = validateItem(item, FIELDS[i]);
      if (problem) {
        return problem;
      }
    }
  }
  return null;
}
