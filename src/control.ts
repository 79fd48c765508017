/**
 * Interface toolbar controls. Numbered across all controls of the provider, not per interface;
 * the number is what control-pipe messages address.
 */

import type { ArgumentValueOptions } from './argument.js';
import { field, optionalField } from './descriptor.js';
import type { ButtonRole, ControlKind } from './types.js';
import { validateControlOptions } from './validation.js';

export type ControlValueOptions = ArgumentValueOptions;

export interface ControlOptions {
  kind: ControlKind;
  /** Required for (and only allowed on) buttons. */
  role?: ButtonRole;
  display?: string;
  default?: string | number | boolean;
  range?: string;
  validation?: string;
  tooltip?: string;
  placeholder?: string;
  values?: ControlValueOptions[];
}

export interface ControlValue {
  readonly controlOrdinal: number;
  readonly value: string;
  readonly display?: string;
  readonly isDefault?: boolean;
}

export interface ToolbarControl {
  readonly ordinal: number;
  readonly kind: ControlKind;
  readonly role?: ButtonRole;
  readonly display?: string;
  readonly default?: string;
  readonly range?: string;
  readonly validation?: string;
  readonly tooltip?: string;
  readonly placeholder?: string;
  readonly values: readonly ControlValue[];
}

export function createControl(ordinal: number, options: ControlOptions): ToolbarControl {
  validateControlOptions(options);
  return {
    ordinal,
    kind: options.kind,
    role: options.role,
    display: options.display,
    default: options.default === undefined ? undefined : String(options.default),
    range: options.range,
    validation: options.validation,
    tooltip: options.tooltip,
    placeholder: options.placeholder,
    values: (options.values ?? []).map((v) => ({
      controlOrdinal: ordinal,
      value: String(v.value),
      display: v.display,
      isDefault: v.isDefault,
    })),
  };
}

export function renderControlValue(value: ControlValue): string {
  return (
    'value ' +
    field('control', value.controlOrdinal) +
    field('value', value.value) +
    field('display', value.display ?? value.value) +
    optionalField('default', value.isDefault)
  );
}

export function renderControl(control: ToolbarControl): string[] {
  const line =
    'control ' +
    field('number', control.ordinal) +
    field('type', control.kind) +
    optionalField('role', control.role) +
    optionalField('display', control.display) +
    optionalField('default', control.default) +
    optionalField('range', control.range) +
    optionalField('validation', control.validation) +
    optionalField('tooltip', control.tooltip) +
    optionalField('placeholder', control.placeholder);
  return [line, ...control.values.map(renderControlValue)];
}
