import { describe, it, expect } from 'vitest';
import { PipelineContext } from '../../../src/application/PipelineContext.js';
import { resolveBatchOptions } from '../../../src/domain/model/BatchOptions.js';
import type { BatchOptions } from '../../../src/domain/model/BatchOptions.js';
import { FakeGeocoder } from '../../fixtures/FakeGeocoder.js';

function context(options: BatchOptions): PipelineContext {
  const ctx = new PipelineContext(new FakeGeocoder(), options);
  ctx.resolved = resolveBatchOptions(options);
  return ctx;
}

describe('PipelineContext', () => {
  describe('markDropped', () => {
    it('should remember dropped rows for ordered output', () => {
      const ctx = context({ ordered: true });
      ctx.markDropped(2);
      ctx.markDropped(5);
      expect([...ctx.droppedRowIds]).toEqual([2, 5]);
    });

    it('should not accumulate dropped rows in completion order', () => {
      const ctx = context({ ordered: false });
      ctx.markDropped(2);
      ctx.markDropped(5);
      expect(ctx.droppedRowIds.size).toBe(0);
    });
  });

  describe('requestParams', () => {
    it('should ask for a single result unless a result index is projected', () => {
      expect(context({ outputFields: ['formatted'] }).requestParams()).toEqual({ no_annotations: true, limit: 1 });
    });
  });
});
