/**
 * Definition validation for extcap configs, interfaces, arguments and controls.
 */

import { MAX_LINK_TYPE } from './constants.js';
import { ARGUMENT_KINDS, VALUE_ARGUMENT_KINDS } from './types.js';
import type { ArgumentKind } from './types.js';
import type { ArgumentOptions, ArgumentValueOptions } from './argument.js';
import type { InterfaceOptions } from './capture-interface.js';
import type { ControlOptions } from './control.js';
import type { ExtcapConfig } from './extcap.js';

/** Which registration a rejected definition belongs to. */
export type DefinitionKind = 'config' | 'interface' | 'argument' | 'control';

export class ValidationError extends Error {
  constructor(
    public readonly definition: DefinitionKind,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

type Check = (condition: boolean, message: string, field?: string) => asserts condition;

function checkerFor(definition: DefinitionKind): Check {
  return (condition, message, field) => {
    if (!condition) {
      throw new ValidationError(definition, message, field);
    }
  };
}

const checkConfig: Check = checkerFor('config');
const checkInterface: Check = checkerFor('interface');
const checkArgument: Check = checkerFor('argument');
const checkControl: Check = checkerFor('control');

const ARGUMENT_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;
const BUTTON_ROLES = ['control', 'logger', 'help', 'restore'];
const CONTROL_KINDS = ['boolean', 'button', 'selector', 'string'];

function isArgumentKind(kind: string): kind is ArgumentKind {
  return ARGUMENT_KINDS.some((known) => known === kind);
}

function assertOptionalString(check: Check, value: unknown, field: string): void {
  check(value === undefined || typeof value === 'string', `${field} must be a string`, field);
}

function validateValues(check: Check, values: readonly ArgumentValueOptions[] | undefined, field: string): void {
  if (values === undefined) return;
  check(Array.isArray(values), `${field} must be an array`, field);
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    check(
      v != null && (typeof v.value === 'string' || typeof v.value === 'number'),
      `${field}[${i}].value must be a string or number`,
      field
    );
    assertOptionalString(check, v.display, `${field}[${i}].display`);
  }
}

export function validateArgumentOptions(options: ArgumentOptions): void {
  checkArgument(options != null && typeof options === 'object', 'argument must be an object');
  checkArgument(
    typeof options.name === 'string' && ARGUMENT_NAME.test(options.name),
    `argument name must match ${ARGUMENT_NAME.source}`,
    'name'
  );
  checkArgument(isArgumentKind(options.kind), `argument kind must be one of ${ARGUMENT_KINDS.join(', ')}`, 'kind');
  assertOptionalString(checkArgument, options.display, 'display');
  assertOptionalString(checkArgument, options.range, 'range');
  assertOptionalString(checkArgument, options.validation, 'validation');
  assertOptionalString(checkArgument, options.placeholder, 'placeholder');
  assertOptionalString(checkArgument, options.tooltip, 'tooltip');
  assertOptionalString(checkArgument, options.group, 'group');

  checkArgument(
    options.mustExist === undefined || options.kind === 'fileselect',
    `mustExist only applies to fileselect arguments (--${options.name})`,
    'mustExist'
  );
  checkArgument(
    options.reload === undefined || options.kind === 'selector',
    `reload only applies to selector arguments (--${options.name})`,
    'reload'
  );
  checkArgument(
    options.values === undefined ||
      options.values.length === 0 ||
      VALUE_ARGUMENT_KINDS.includes(options.kind),
    `values only apply to ${VALUE_ARGUMENT_KINDS.join('/')} arguments (--${options.name})`,
    'values'
  );
  validateValues(checkArgument, options.values, 'values');
}

export function validateInterfaceOptions(options: InterfaceOptions): void {
  checkInterface(options != null && typeof options === 'object', 'interface must be an object');
  checkInterface(
    typeof options.name === 'string' && options.name !== '' && !/\s/.test(options.name),
    'interface name must be a non-empty string without whitespace',
    'name'
  );
  assertOptionalString(checkInterface, options.description, 'description');
  assertOptionalString(checkInterface, options.linkTypeName, 'linkTypeName');
  assertOptionalString(checkInterface, options.linkTypeDescription, 'linkTypeDescription');
  if (options.linkType !== undefined) {
    const lt = options.linkType;
    checkInterface(
      typeof lt === 'number' && Number.isInteger(lt) && lt >= 0 && lt <= MAX_LINK_TYPE,
      `linkType must be an integer between 0 and ${MAX_LINK_TYPE}`,
      'linkType'
    );
  }
}

export function validateControlOptions(options: ControlOptions): void {
  checkControl(options != null && typeof options === 'object', 'control must be an object');
  checkControl(CONTROL_KINDS.includes(options.kind), `control kind must be one of ${CONTROL_KINDS.join(', ')}`, 'kind');
  if (options.kind === 'button') {
    checkControl(
      options.role !== undefined && BUTTON_ROLES.includes(options.role),
      `button controls require a role (${BUTTON_ROLES.join(', ')})`,
      'role'
    );
  } else {
    checkControl(options.role === undefined, 'role only applies to button controls', 'role');
  }
  assertOptionalString(checkControl, options.display, 'display');
  assertOptionalString(checkControl, options.range, 'range');
  assertOptionalString(checkControl, options.validation, 'validation');
  assertOptionalString(checkControl, options.tooltip, 'tooltip');
  assertOptionalString(checkControl, options.placeholder, 'placeholder');
  checkControl(
    options.values === undefined || options.values.length === 0 || options.kind === 'selector',
    'values only apply to selector controls',
    'values'
  );
  validateValues(checkControl, options.values, 'values');
}

export function validateExtcapConfig(config: ExtcapConfig): void {
  checkConfig(config != null && typeof config === 'object', 'config must be an object');
  checkConfig(typeof config.name === 'string' && config.name.trim() !== '', 'name must be a non-empty string', 'name');
  assertOptionalString(checkConfig, config.version, 'version');
  assertOptionalString(checkConfig, config.helpPage, 'helpPage');
  assertOptionalString(checkConfig, config.about, 'about');
  assertOptionalString(checkConfig, config.author, 'author');
  assertOptionalString(checkConfig, config.usage, 'usage');
  assertOptionalString(checkConfig, config.afterHelp, 'afterHelp');
}
