import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  formNumber,
  formString,
  optionalFormString,
  safeRedirectPath,
} from './formData';

function form(entries: Record<string, string>): FormData {
  const data = new FormData();
  for (const [key, value] of Object.entries(entries)) data.append(key, value);
  return data;
}

describe('form helpers', () => {
  it('reads text fields', () => {
    const data = form({ username: 'alice', name: '   ' });
    assert.strictEqual(formString(data, 'username'), 'alice');
    assert.strictEqual(formString(data, 'missing'), '');
    assert.strictEqual(optionalFormString(data, 'name'), undefined);
    assert.strictEqual(optionalFormString(data, 'username'), 'alice');
  });

  it('reads numbers and gives NaN for blank input', () => {
    const data = form({ quantity: ' 1.5 ', blank: '', word: 'two' });
    assert.strictEqual(formNumber(data, 'quantity'), 1.5);
    assert.ok(Number.isNaN(formNumber(data, 'blank')));
    assert.ok(Number.isNaN(formNumber(data, 'word')));
  });

  it('only follows same-origin redirect paths', () => {
    assert.strictEqual(safeRedirectPath('/bowls', '/bowl'), '/bowls');
    assert.strictEqual(safeRedirectPath(undefined, '/bowl'), '/bowl');
    assert.strictEqual(safeRedirectPath('//evil.example', '/bowl'), '/bowl');
    assert.strictEqual(safeRedirectPath('https://evil.example', '/bowl'), '/bowl');
  });
});
