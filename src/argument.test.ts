import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createArgument, renderArgument, renderArgumentValue, replaceArgumentValues, takesValue } from './argument.js';
import { ValidationError } from './validation.js';

describe('createArgument', () => {
  it('stringifies the default and keeps the ordinal', () => {
    const arg = createArgument(3, { name: 'delay', kind: 'integer', default: 250 });
    assert.equal(arg.ordinal, 3);
    assert.equal(arg.default, '250');
    assert.deepEqual(arg.values, []);
  });

  it('points every value at the owning argument', () => {
    const arg = createArgument(1, {
      name: 'mode',
      kind: 'radio',
      values: [{ value: 'fast' }, { value: 2, display: 'Two', isDefault: true }],
    });
    assert.deepEqual(
      arg.values.map((v) => [v.argOrdinal, v.value, v.display, v.isDefault]),
      [
        [1, 'fast', undefined, undefined],
        [1, '2', 'Two', true],
      ]
    );
  });

  it('rejects names that cannot be flags', () => {
    assert.throws(
      () => createArgument(0, { name: '-bad', kind: 'string' }),
      (err: unknown) => err instanceof ValidationError && err.field === 'name'
    );
    assert.throws(() => createArgument(0, { name: 'has space', kind: 'string' }), ValidationError);
  });

  it('rejects values on kinds without a value list', () => {
    assert.throws(
      () => createArgument(0, { name: 'port', kind: 'integer', values: [{ value: 1 }] }),
      (err: unknown) => err instanceof ValidationError && err.field === 'values'
    );
  });

  it('rejects reload outside selectors and mustExist outside fileselect', () => {
    assert.throws(
      () => createArgument(0, { name: 'r', kind: 'radio', reload: true }),
      (err: unknown) => err instanceof ValidationError && err.field === 'reload'
    );
    assert.throws(
      () => createArgument(0, { name: 'f', kind: 'string', mustExist: true }),
      (err: unknown) => err instanceof ValidationError && err.field === 'mustExist'
    );
  });
});

describe('takesValue', () => {
  it('is false only for boolflag', () => {
    assert.equal(takesValue({ kind: 'boolflag' }), false);
    assert.equal(takesValue({ kind: 'boolean' }), true);
    assert.equal(takesValue({ kind: 'string' }), true);
  });
});

describe('renderArgument', () => {
  it('emits required fields and only the optional fields that are set', () => {
    const arg = createArgument(0, { name: 'delay', kind: 'integer', display: 'Delay', default: 5, range: '1,10' });
    assert.deepEqual(renderArgument(arg), ['arg {number=0}{call=--delay}{display=Delay}{type=integer}{default=5}{range=1,10}']);
  });

  it('falls back to the name for display', () => {
    const arg = createArgument(4, { name: 'verbose', kind: 'boolflag', default: false });
    assert.deepEqual(renderArgument(arg), ['arg {number=4}{call=--verbose}{display=verbose}{type=boolflag}{default=false}']);
  });

  it('emits optional fields in a fixed order', () => {
    const arg = createArgument(2, {
      name: 'path',
      kind: 'fileselect',
      group: 'Files',
      tooltip: 'Input file',
      placeholder: '/tmp/x',
      mustExist: true,
      validation: '^/',
    });
    assert.deepEqual(renderArgument(arg), [
      'arg {number=2}{call=--path}{display=path}{type=fileselect}{validation=^/}{mustexist=true}' +
        '{placeholder=/tmp/x}{tooltip=Input file}{group=Files}',
    ]);
  });

  it('follows the arg line with one value line per value', () => {
    const arg = createArgument(2, {
      name: 'remote',
      kind: 'selector',
      reload: true,
      values: [{ value: 'a', isDefault: true }, { value: 'b', display: 'Bee' }],
    });
    assert.deepEqual(renderArgument(arg), [
      'arg {number=2}{call=--remote}{display=remote}{type=selector}{reload=true}',
      'value {arg=2}{value=a}{display=a}{default=true}',
      'value {arg=2}{value=b}{display=Bee}',
    ]);
  });

  it('renders an explicit non-default value flag', () => {
    assert.equal(
      renderArgumentValue({ argOrdinal: 0, value: 'x', isDefault: false }),
      'value {arg=0}{value=x}{display=x}{default=false}'
    );
  });
});

describe('replaceArgumentValues', () => {
  it('replaces the whole value list', () => {
    const arg = createArgument(1, { name: 'remote', kind: 'selector', values: [{ value: 'old' }] });
    replaceArgumentValues(arg, [{ value: 'new1' }, { value: 'new2', isDefault: true }]);
    assert.deepEqual(renderArgument(arg), [
      'arg {number=1}{call=--remote}{display=remote}{type=selector}',
      'value {arg=1}{value=new1}{display=new1}',
      'value {arg=1}{value=new2}{display=new2}{default=true}',
    ]);
  });
});
