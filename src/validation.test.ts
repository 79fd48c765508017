/**
 * Definition validation for configs, interfaces, arguments and controls.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ValidationError,
  validateArgumentOptions,
  validateControlOptions,
  validateExtcapConfig,
  validateInterfaceOptions,
} from './validation.js';

describe('validateExtcapConfig', () => {
  it('accepts a name-only config', () => {
    assert.doesNotThrow(() => validateExtcapConfig({ name: 'provider' }));
  });

  it('accepts a full config', () => {
    assert.doesNotThrow(() =>
      validateExtcapConfig({
        name: 'provider',
        version: '1.0.0',
        helpPage: 'https://example.com/help',
        about: 'About text',
        author: 'Someone',
        usage: 'provider [OPTIONS]',
        afterHelp: 'See also the manual',
      })
    );
  });

  it('rejects a blank name', () => {
    assert.throws(
      () => validateExtcapConfig({ name: '  ' }),
      (err: unknown) => err instanceof ValidationError && err.definition === 'config' && err.field === 'name'
    );
  });
});

describe('validateArgumentOptions', () => {
  it('accepts names with digits, dashes and underscores', () => {
    assert.doesNotThrow(() => validateArgumentOptions({ name: '0remote_host-1', kind: 'string' }));
  });

  it('rejects an unknown kind', () => {
    assert.throws(
      () => validateArgumentOptions({ name: 'x', kind: 'float' as never }),
      (err: unknown) => err instanceof ValidationError && err.field === 'kind'
    );
  });

  it('accepts values on multicheck and an empty value list anywhere', () => {
    assert.doesNotThrow(() => validateArgumentOptions({ name: 'x', kind: 'multicheck', values: [{ value: 'a' }] }));
    assert.doesNotThrow(() => validateArgumentOptions({ name: 'y', kind: 'integer', values: [] }));
  });

  it('names the offending value', () => {
    assert.throws(
      () => validateArgumentOptions({ name: 'x', kind: 'selector', values: [{ value: 'ok' }, { value: 'a', display: 5 as never }] }),
      /values\[1\]\.display must be a string/
    );
  });
});

describe('validateInterfaceOptions', () => {
  it('accepts the full link type range', () => {
    assert.doesNotThrow(() => validateInterfaceOptions({ name: 'a', linkType: 0 }));
    assert.doesNotThrow(() => validateInterfaceOptions({ name: 'a', linkType: 0xffffffff }));
  });

  it('rejects a fractional link type', () => {
    assert.throws(
      () => validateInterfaceOptions({ name: 'a', linkType: 1.5 }),
      (err: unknown) => err instanceof ValidationError && err.definition === 'interface' && err.field === 'linkType'
    );
  });
});

describe('validateControlOptions', () => {
  it('accepts every button role', () => {
    for (const role of ['control', 'logger', 'help', 'restore'] as const) {
      assert.doesNotThrow(() => validateControlOptions({ kind: 'button', role }));
    }
  });

  it('rejects an unknown kind', () => {
    assert.throws(
      () => validateControlOptions({ kind: 'slider' as never }),
      (err: unknown) => err instanceof ValidationError && err.definition === 'control' && err.field === 'kind'
    );
  });
});
