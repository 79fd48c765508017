import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';
import { exitCodeFor, formatFailure } from './entrypoint.js';
import { ExtcapError } from './errors.js';
import { ValidationError } from './validation.js';

describe('exitCodeFor', () => {
  it('maps flag, interface and step errors to the configuration exit code', () => {
    assert.equal(exitCodeFor(ExtcapError.flagParse('bad flag')), EXIT_CONFIG);
    assert.equal(exitCodeFor(ExtcapError.missingInterface()), EXIT_CONFIG);
    assert.equal(exitCodeFor(ExtcapError.invalidInterface('x')), EXIT_CONFIG);
    assert.equal(exitCodeFor(ExtcapError.unknownStep()), EXIT_CONFIG);
  });

  it('maps everything else to the runtime exit code', () => {
    assert.equal(exitCodeFor(ExtcapError.io('pipe closed')), EXIT_RUNTIME);
    assert.equal(exitCodeFor(ExtcapError.user('device gone')), EXIT_RUNTIME);
    assert.equal(exitCodeFor(ExtcapError.notImplemented('capture')), EXIT_RUNTIME);
    assert.equal(exitCodeFor(new Error('plain')), EXIT_RUNTIME);
  });
});

describe('formatFailure', () => {
  it('prefixes the provider name', () => {
    assert.equal(formatFailure('sample', ExtcapError.invalidInterface('sim9')), 'sample: Invalid interface: sim9');
    assert.equal(formatFailure('sample', 'text'), 'sample: text');
  });

  it('names the invalid definition field', () => {
    assert.equal(
      formatFailure('sample', new ValidationError('interface', 'must be a uint32', 'linkType')),
      'sample: invalid interface linkType: must be a uint32'
    );
    assert.equal(
      formatFailure('sample', new ValidationError('control', 'at most 256 controls can be registered')),
      'sample: invalid control: at most 256 controls can be registered'
    );
  });
});
