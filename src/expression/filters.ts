/**
 * Filter registry for the `value | name(args)` pipeline syntax.
 *
 * Filters are pure functions of their subject and arguments. Display-only
 * filters (date formatting) are rejected in guard and value expressions, so
 * they can never affect control flow.
 *
 * @packageDocumentation
 */

import { isList, isValueObject } from './context.js';
import { EvaluationError, type EvalValue } from './types.js';
import { describeType, isTruthy, stringifyValue } from './values.js';

/**
 * A pure filter.
 */
export interface FilterDefinition {
  /** Name used after the `|`. */
  readonly name: string;
  /** Whether the filter may only appear in templates. */
  readonly displayOnly: boolean;
  /** Minimum number of arguments. */
  readonly minArgs: number;
  /** Maximum number of arguments. */
  readonly maxArgs: number;
  /**
   * Applies the filter.
   *
   * @throws EvaluationError on an unsupported subject or argument.
   */
  apply(subject: EvalValue, args: readonly EvalValue[]): EvalValue;
}

const MONTH_NAMES: readonly string[] = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const WEEKDAY_NAMES: readonly string[] = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

function requireString(filter: string, value: EvalValue): string {
  if (typeof value !== 'string') {
    throw new EvaluationError(`Filter '${filter}' expects a string, got ${describeType(value)}`);
  }
  return value;
}

/**
 * Formats a `YYYY-MM-DD` date (or ISO timestamp) with a strftime subset.
 *
 * Supported directives: `%Y %m %d %e %B %b %A %a %%`.
 */
export function formatDate(input: string, format: string): string {
  const match = DATE_PREFIX.exec(input);
  if (match === null) {
    throw new EvaluationError(`Filter 'date' expects a YYYY-MM-DD date, got '${input}'`);
  }
  const [, yearText = '', monthText = '', dayText = ''] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const weekday = new Date(Date.UTC(year, month - 1, day)).getUTCDay();
  const monthName = MONTH_NAMES[month - 1] ?? '';
  const weekdayName = WEEKDAY_NAMES[weekday] ?? '';

  return format.replace(/%([YmdeBbAa%])/g, (_whole, directive: string) => {
    switch (directive) {
      case 'Y':
        return yearText;
      case 'm':
        return monthText;
      case 'd':
        return dayText;
      case 'e':
        return String(day);
      case 'B':
        return monthName;
      case 'b':
        return monthName.slice(0, 3);
      case 'A':
        return weekdayName;
      case 'a':
        return weekdayName.slice(0, 3);
      default:
        return '%';
    }
  });
}

/**
 * Built-in filters.
 */
export const DEFAULT_FILTERS: readonly FilterDefinition[] = [
  {
    name: 'default',
    displayOnly: false,
    minArgs: 1,
    maxArgs: 2,
    apply(subject, args) {
      const [fallback, checkFalsy] = args;
      if (subject === undefined || (isTruthy(checkFalsy) && !isTruthy(subject))) {
        return fallback;
      }
      return subject;
    },
  },
  {
    name: 'length',
    displayOnly: false,
    minArgs: 0,
    maxArgs: 0,
    apply(subject) {
      if (typeof subject === 'string' || isList(subject)) {
        return subject.length;
      }
      if (isValueObject(subject)) {
        return Object.keys(subject).length;
      }
      throw new EvaluationError(`Filter 'length' cannot measure ${describeType(subject)}`);
    },
  },
  {
    name: 'lower',
    displayOnly: false,
    minArgs: 0,
    maxArgs: 0,
    apply(subject) {
      return subject === undefined ? undefined : requireString('lower', subject).toLowerCase();
    },
  },
  {
    name: 'upper',
    displayOnly: false,
    minArgs: 0,
    maxArgs: 0,
    apply(subject) {
      return subject === undefined ? undefined : requireString('upper', subject).toUpperCase();
    },
  },
  {
    name: 'trim',
    displayOnly: false,
    minArgs: 0,
    maxArgs: 0,
    apply(subject) {
      return subject === undefined ? undefined : requireString('trim', subject).trim();
    },
  },
  {
    name: 'join',
    displayOnly: false,
    minArgs: 0,
    maxArgs: 1,
    apply(subject, args) {
      if (subject === undefined) {
        return undefined;
      }
      if (!isList(subject)) {
        throw new EvaluationError(`Filter 'join' expects a list, got ${describeType(subject)}`);
      }
      const [separator = ''] = args;
      return subject.map((item) => stringifyValue(item)).join(requireString('join', separator));
    },
  },
  {
    name: 'date',
    displayOnly: true,
    minArgs: 0,
    maxArgs: 1,
    apply(subject, args) {
      if (subject === undefined || subject === null) {
        return undefined;
      }
      const [format = '%Y-%m-%d'] = args;
      return formatDate(requireString('date', subject), requireString('date', format));
    },
  },
];

/**
 * Immutable lookup of filters by name.
 */
export class FilterRegistry {
  private readonly filters: ReadonlyMap<string, FilterDefinition>;

  /**
   * Creates a registry.
   *
   * @param definitions - Filters to register; defaults to {@link DEFAULT_FILTERS}.
   * @throws Error if two filters share a name.
   */
  constructor(definitions: readonly FilterDefinition[] = DEFAULT_FILTERS) {
    const filters = new Map<string, FilterDefinition>();
    for (const definition of definitions) {
      if (filters.has(definition.name)) {
        throw new Error(`Duplicate filter '${definition.name}'`);
      }
      filters.set(definition.name, definition);
    }
    this.filters = filters;
  }

  /**
   * Looks up a filter.
   *
   * @returns The filter, or undefined if none is registered under that name.
   */
  get(name: string): FilterDefinition | undefined {
    return this.filters.get(name);
  }

  /**
   * Lists registered filter names in registration order.
   */
  names(): string[] {
    return [...this.filters.keys()];
  }
}

/**
 * Registry holding the built-in filters.
 */
export const defaultFilterRegistry = new FilterRegistry();
