/**
 * Unit tests for template expansion
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { expandTemplate, type TemplateLookup } from '../../../src/config/template.js';
import { TemplateError } from '../../../src/core/errors.js';

function lookupFrom(values: Record<string, string | number>): TemplateLookup {
  return (key) => values[key];
}

function expand(template: string, values: Record<string, string | number>): string {
  return expandTemplate(template, lookupFrom(values));
}

function assertTemplateError(fn: () => unknown, code: string, key?: string): void {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof TemplateError);
    assert.strictEqual(error.code, code);
    if (key !== undefined) {
      assert.strictEqual(error.key, key);
    }
    return true;
  });
}

describe('expandTemplate', () => {
  describe('placeholders', () => {
    it('should substitute names', () => {
      assert.strictEqual(expand('{name}.{domain}', { name: 'dev01', domain: 'lab.test' }), 'dev01.lab.test');
    });

    it('should build the default guest name', () => {
      assert.strictEqual(expand('{lab}{guest:02d}', { lab: 'dev', guest: 1 }), 'dev01');
      assert.strictEqual(expand('{lab}{guest:02d}', { lab: 'dev', guest: 12 }), 'dev12');
    });

    it('should accept dotted option names', () => {
      assert.strictEqual(expand('hosts: {group.web}', { 'group.web': '1..3' }), 'hosts: 1..3');
    });

    it('should leave text without placeholders unchanged', () => {
      assert.strictEqual(expand('plain text', {}), 'plain text');
    });

    it('should turn doubled braces into literal braces', () => {
      assert.strictEqual(expand('{{literal}} {x}', { x: 'y' }), '{literal} y');
    });
  });

  describe('format specs', () => {
    it('should align strings left by default and numbers right', () => {
      assert.strictEqual(expand('[{s:4}]', { s: 'a' }), '[a   ]');
      assert.strictEqual(expand('[{n:4}]', { n: 7 }), '[   7]');
    });

    it('should honor explicit alignment and fill', () => {
      assert.strictEqual(expand('{s:>5}', { s: 'ab' }), '   ab');
      assert.strictEqual(expand('{s:<5}|', { s: 'ab' }), 'ab   |');
      assert.strictEqual(expand('{s:*^7}', { s: 'mid' }), '**mid**');
    });

    it('should zero-pad after the sign', () => {
      assert.strictEqual(expand('{n:05d}', { n: -42 }), '-0042');
    });

    it('should convert numeric strings for integer types', () => {
      assert.strictEqual(expand('{n:d}', { n: '42' }), '42');
      assert.strictEqual(expand('{n:03d}', { n: ' 5 ' }), '005');
    });

    it('should render other bases', () => {
      assert.strictEqual(expand('{n:x}', { n: 255 }), 'ff');
      assert.strictEqual(expand('{n:X}', { n: 255 }), 'FF');
      assert.strictEqual(expand('{n:o}', { n: 8 }), '10');
      assert.strictEqual(expand('{n:b}', { n: 5 }), '101');
    });

    it('should group thousands', () => {
      assert.strictEqual(expand('{n:,d}', { n: 1234567 }), '1,234,567');
    });

    it('should apply precision to floats and strings', () => {
      assert.strictEqual(expand('{n:.2f}', { n: 3.14159 }), '3.14');
      assert.strictEqual(expand('{s:.3}', { s: 'abcdef' }), 'abc');
    });

    it('should add a plus sign on request', () => {
      assert.strictEqual(expand('{n:+d}', { n: 5 }), '+5');
    });
  });

  describe('errors', () => {
    it('should report unknown keys', () => {
      assertTemplateError(() => expand('{missing}', {}), 'TEMPLATE_KEY_MISSING', 'missing');
    });

    it('should reject an unmatched opening brace', () => {
      assertTemplateError(() => expand('{lab', { lab: 'dev' }), 'TEMPLATE_INVALID');
    });

    it('should reject a single closing brace', () => {
      assertTemplateError(() => expand('a}b', {}), 'TEMPLATE_INVALID');
    });

    it('should reject invalid placeholder names', () => {
      assertTemplateError(() => expand('{1abc}', {}), 'TEMPLATE_INVALID');
      assertTemplateError(() => expand('{}', {}), 'TEMPLATE_INVALID');
    });

    it('should reject malformed format specs', () => {
      assertTemplateError(() => expand('{n:q}', { n: 1 }), 'TEMPLATE_INVALID', 'n');
    });

    it('should reject non-numeric values for numeric types', () => {
      assertTemplateError(() => expand('{n:d}', { n: 'abc' }), 'TEMPLATE_INVALID', 'n');
      assertTemplateError(() => expand('{n:d}', { n: '' }), 'TEMPLATE_INVALID', 'n');
    });

    it('should reject fractions for the integer type', () => {
      assertTemplateError(() => expand('{n:d}', { n: 2.5 }), 'TEMPLATE_INVALID', 'n');
    });
  });
});
