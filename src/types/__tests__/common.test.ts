import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { listPageSchema, parsePayload, typeReference } from '../common.js';
import { UnexpectedResponseError } from '../../errors/index.js';

describe('typeReference', () => {
  it('should join category and value', () => {
    expect(typeReference('Operation_Type', 'Upsert')).toEqual({ id: 'Operation_Type=Upsert' });
  });
});

describe('parsePayload', () => {
  const schema = listPageSchema(z.object({ id: z.string() }));

  it('should keep unknown attributes', () => {
    expect(parsePayload(schema, { total: 1, data: [{ id: 'T1' }], next: 'x' }, 'table page')).toEqual({
      total: 1,
      data: [{ id: 'T1' }],
      next: 'x',
    });
  });

  it('should report each issue with its path', () => {
    const error = (() => {
      try {
        return parsePayload(schema, { data: [{ id: 7 }] }, 'table page');
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(UnexpectedResponseError);
    expect(error).toHaveProperty('message', 'Unexpected table page payload: data.0.id: Expected string, received number');
  });
});
