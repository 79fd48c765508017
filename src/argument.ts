/**
 * Interface configuration arguments and their selectable values.
 */

import { field, optionalField } from './descriptor.js';
import type { ArgumentKind } from './types.js';
import { validateArgumentOptions } from './validation.js';

export interface ArgumentValueOptions {
  value: string | number;
  display?: string;
  isDefault?: boolean;
}

/** Options for one argument; every argument becomes a `--<name>` flag. */
export interface ArgumentOptions {
  name: string;
  kind: ArgumentKind;
  display?: string;
  default?: string | number | boolean;
  range?: string;
  /** Regular expression the host applies to the entered value. */
  validation?: string;
  /** fileselect only. */
  mustExist?: boolean;
  /** selector only: the host may ask for the values again via --extcap-reload-option. */
  reload?: boolean;
  placeholder?: string;
  tooltip?: string;
  group?: string;
  values?: ArgumentValueOptions[];
}

export interface ArgumentValue {
  /** Ordinal of the owning argument. */
  readonly argOrdinal: number;
  readonly value: string;
  readonly display?: string;
  readonly isDefault?: boolean;
}

export interface ArgumentSpec {
  /** Insertion index within the owning interface. */
  readonly ordinal: number;
  readonly name: string;
  readonly kind: ArgumentKind;
  readonly display?: string;
  readonly default?: string;
  readonly range?: string;
  readonly validation?: string;
  readonly mustExist?: boolean;
  readonly reload?: boolean;
  readonly placeholder?: string;
  readonly tooltip?: string;
  readonly group?: string;
  values: ArgumentValue[];
}

function toValue(argOrdinal: number, options: ArgumentValueOptions): ArgumentValue {
  return {
    argOrdinal,
    value: String(options.value),
    display: options.display,
    isDefault: options.isDefault,
  };
}

/** Validates the options and builds the argument at the given ordinal. */
export function createArgument(ordinal: number, options: ArgumentOptions): ArgumentSpec {
  validateArgumentOptions(options);
  return {
    ordinal,
    name: options.name,
    kind: options.kind,
    display: options.display,
    default: options.default === undefined ? undefined : String(options.default),
    range: options.range,
    validation: options.validation,
    mustExist: options.mustExist,
    reload: options.reload,
    placeholder: options.placeholder,
    tooltip: options.tooltip,
    group: options.group,
    values: (options.values ?? []).map((v) => toValue(ordinal, v)),
  };
}

/** Boolflag arguments are switches; every other kind takes a value. */
export function takesValue(arg: Pick<ArgumentSpec, 'kind'>): boolean {
  return arg.kind !== 'boolflag';
}

/** Replaces the values with a reloaded list, re-pointing each at this argument. */
export function replaceArgumentValues(arg: ArgumentSpec, values: readonly ArgumentValueOptions[]): void {
  arg.values = values.map((v) => toValue(arg.ordinal, v));
}

export function renderArgumentValue(value: ArgumentValue): string {
  return (
    'value ' +
    field('arg', value.argOrdinal) +
    field('value', value.value) +
    field('display', value.display ?? value.value) +
    optionalField('default', value.isDefault)
  );
}

/** The `arg` line followed by one `value` line per selectable value. */
export function renderArgument(arg: ArgumentSpec): string[] {
  const line =
    'arg ' +
    field('number', arg.ordinal) +
    field('call', `--${arg.name}`) +
    field('display', arg.display ?? arg.name) +
    field('type', arg.kind) +
    optionalField('default', arg.default) +
    optionalField('range', arg.range) +
    optionalField('validation', arg.validation) +
    optionalField('mustexist', arg.mustExist) +
    optionalField('reload', arg.reload) +
    optionalField('placeholder', arg.placeholder) +
    optionalField('tooltip', arg.tooltip) +
    optionalField('group', arg.group);
  return [line, ...arg.values.map(renderArgumentValue)];
}
