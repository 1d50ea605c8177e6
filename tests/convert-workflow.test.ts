/**
 * @file tests/convert-workflow.test.ts
 * @description Convert workflow: input parsing, unit resolution order and the summary line.
 */

import { describe, expect, it } from 'vitest';
import { createUnitRegistry } from '../packages/core/src/lib/registry';
import { UNIT_TABLE } from '../packages/core/src/lib/units';
import {
  BelowAbsoluteZeroError,
  CategoryMismatchError,
  NumberParseError,
  UnknownUnitError,
} from '../packages/core/src/shared/errors';
import { runConvertWorkflow } from '../packages/core/src/workflows/convert-workflow';

const captureError = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected the workflow to throw');
};

describe('runConvertWorkflow', () => {
  it('resolves aliases and keeps the raw unit names in the summary', () => {
    const result = runConvertWorkflow({ value: '100', from: 'celsius', to: 'F' });
    expect(result.from.name).toBe('C');
    expect(result.to.name).toBe('F');
    expect(result.value).toBe(100);
    expect(result.result).toBe(212);
    expect(result.summary).toBe('100 celsius = 212 F');
    expect(result.warnings).toEqual([]);
  });

  it('prints the parsed value rather than the raw text', () => {
    const result = runConvertWorkflow({ value: '1e3', from: 'm', to: 'km' });
    expect(result.summary).toBe('1000 m = 1 km');
  });

  it('passes negative-length warnings through', () => {
    const result = runConvertWorkflow({ value: '-5', from: 'km', to: 'm' });
    expect(result.summary).toBe('-5 km = -5000 m');
    expect(result.warnings.map((warning) => warning.code)).toEqual(['negative-length']);
  });

  it('rejects non-numeric values before resolving units', () => {
    const error = captureError(() => runConvertWorkflow({ value: 'x', from: 'foo', to: 'bar' }));
    expect(error).toBeInstanceOf(NumberParseError);
  });

  it('reports the source unit first when both are unknown', () => {
    const error = captureError(() => runConvertWorkflow({ value: '1', from: 'foo', to: 'bar' }));
    expect(error).toBeInstanceOf(UnknownUnitError);
    if (error instanceof UnknownUnitError) {
      expect(error.which).toBe('from');
      expect(error.input).toBe('foo');
      expect(error.message).toBe("Unknown unit 'foo'");
    }
  });

  it('reports an unknown target unit', () => {
    const error = captureError(() => runConvertWorkflow({ value: '1', from: 'km', to: 'bogus' }));
    expect(error).toBeInstanceOf(UnknownUnitError);
    if (error instanceof UnknownUnitError) {
      expect(error.which).toBe('to');
      expect(error.input).toBe('bogus');
    }
  });

  it('surfaces category mismatches', () => {
    const error = captureError(() => runConvertWorkflow({ value: '1', from: 'km', to: 'C' }));
    expect(error).toBeInstanceOf(CategoryMismatchError);
  });

  it('surfaces temperatures below absolute zero', () => {
    const error = captureError(() => runConvertWorkflow({ value: '-300', from: 'C', to: 'K' }));
    expect(error).toBeInstanceOf(BelowAbsoluteZeroError);
  });

  it('uses the registry it is given', () => {
    const lengths = createUnitRegistry(UNIT_TABLE.filter((unit) => unit.category === 'Length'));
    const error = captureError(() =>
      runConvertWorkflow({ value: '1', from: 'kg', to: 'g', registry: lengths }),
    );
    expect(error).toBeInstanceOf(UnknownUnitError);
  });
});
