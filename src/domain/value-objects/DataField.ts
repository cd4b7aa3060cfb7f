import { isObject } from 'class-validator';
import { ValidationError } from '../errors';
import { describeJsonType, requireNonNegativeInteger, requireText, requireUrl } from '../validation';

export const DataType = {
  Boolean: 'BOOLEAN',
  Date: 'DATE',
  Duration: 'DURATION',
  Link: 'LINK',
  Number: 'NUMBER',
  Percentage: 'PERCENTAGE',
  Text: 'TEXT',
} as const;

export type DataType = (typeof DataType)[keyof typeof DataType];

export interface DataLink {
  readonly linktext: string;
  readonly href: string;
}

/**
 * Value shape carried by each data type tag. DATE and DURATION are
 * milliseconds (since the epoch, and elapsed, respectively).
 */
export interface DataValueMap {
  BOOLEAN: boolean;
  DATE: number;
  DURATION: number;
  LINK: DataLink;
  NUMBER: number;
  PERCENTAGE: number;
  TEXT: string;
}

export type DataValue = DataValueMap[DataType];

type ValueGuards = { [K in DataType]: (value: unknown) => value is DataValueMap[K] };

const isNumber = (value: unknown): value is number => typeof value === 'number';

const VALUE_GUARDS: ValueGuards = {
  BOOLEAN: (value): value is boolean => typeof value === 'boolean',
  DATE: isNumber,
  DURATION: isNumber,
  LINK: (value): value is DataLink =>
    isObject(value) &&
    !Array.isArray(value) &&
    typeof Reflect.get(value, 'linktext') === 'string' &&
    typeof Reflect.get(value, 'href') === 'string',
  NUMBER: isNumber,
  PERCENTAGE: isNumber,
  TEXT: (value): value is string => typeof value === 'string',
};

/**
 * Whether `value` has the JSON shape the tag requires. Range and format
 * rules are applied separately by `DataField.create`.
 */
export function isDataValue<K extends DataType>(type: K, value: unknown): value is DataValueMap[K] {
  const guard: (value: unknown) => value is DataValueMap[K] = VALUE_GUARDS[type];
  return guard(value);
}

type ValueRules = { [K in DataType]: (value: DataValueMap[K]) => DataValueMap[K] };

const VALUE_RULES: ValueRules = {
  BOOLEAN: (value) => value,
  DATE: (value) => requireNonNegativeInteger('value', value),
  DURATION: (value) => requireNonNegativeInteger('value', value),
  LINK: (value) =>
    Object.freeze({
      linktext: requireText('value.linktext', value.linktext),
      href: requireUrl('value.href', value.href),
    }),
  NUMBER: (value) => {
    if (!Number.isFinite(value)) {
      throw new ValidationError('value', `must be a finite number, got ${value}`);
    }
    return value;
  },
  PERCENTAGE: (value) => {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new ValidationError('value', `percentage must be between 0 and 100, got ${value}`);
    }
    return value;
  },
  TEXT: (value) => value,
};

/**
 * A typed key/value entry displayed on a report, e.g. code coverage or
 * the number of linter errors. The tag and the value shape always agree:
 * instances only come out of the factories below.
 */
export class DataField<T extends DataType = DataType> {
  private constructor(
    private readonly _title: string,
    private readonly _type: T,
    private readonly _value: DataValueMap[T],
  ) {}

  static create<T extends DataType>(title: string, type: T, value: DataValueMap[T]): DataField<T> {
    const checkedTitle = requireText('title', title);
    // A tag typed as the whole DataType union lets any value through the compiler
    if (!isDataValue(type, value)) {
      throw new ValidationError('value', `a ${type} data field cannot hold a ${describeJsonType(value)} value`);
    }
    return new DataField(checkedTitle, type, VALUE_RULES[type](value));
  }

  static boolean(title: string, value: boolean): DataField<'BOOLEAN'> {
    return DataField.create(title, DataType.Boolean, value);
  }

  static date(title: string, value: Date | number): DataField<'DATE'> {
    return DataField.create(title, DataType.Date, value instanceof Date ? value.getTime() : value);
  }

  static duration(title: string, milliseconds: number): DataField<'DURATION'> {
    return DataField.create(title, DataType.Duration, milliseconds);
  }

  static link(title: string, linktext: string, href: string): DataField<'LINK'> {
    return DataField.create(title, DataType.Link, { linktext, href });
  }

  static number(title: string, value: number): DataField<'NUMBER'> {
    return DataField.create(title, DataType.Number, value);
  }

  static percentage(title: string, value: number): DataField<'PERCENTAGE'> {
    return DataField.create(title, DataType.Percentage, value);
  }

  static text(title: string, value: string): DataField<'TEXT'> {
    return DataField.create(title, DataType.Text, value);
  }

  get title(): string {
    return this._title;
  }

  get type(): T {
    return this._type;
  }

  get value(): DataValueMap[T] {
    return this._value;
  }

  equals(other: DataField): boolean {
    if (this._title !== other.title || this._type !== other.type) {
      return false;
    }
    const a: DataValue = this._value;
    const b: DataValue = other.value;
    if (typeof a === 'object' && typeof b === 'object') {
      return a.linktext === b.linktext && a.href === b.href;
    }
    return a === b;
  }
}
