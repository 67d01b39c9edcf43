import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { getValidationError, ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

function schemaOf(validate: () => unknown): StandardSchemaV1<unknown, string> {
  return {
    '~standard': {
      version: 1,
      vendor: 'test',
      validate: () => validate() as StandardSchemaV1.Result<string>,
    },
  };
}

describe('validator', () => {
  it('returns the parsed value for a matching zod schema', async () => {
    const schema = z.object({ itemName: z.string() });
    const [err, parsed] = await validator({ itemName: 'Home' }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ itemName: 'Home' });
  });

  it('returns transformed output', async () => {
    const schema = z.object({ total: z.string() }).transform(({ total }) => Number(total));
    const [err, parsed] = await validator({ total: '3' }, schema);

    expect(err).toBeNull();
    expect(parsed).toBe(3);
  });

  it('returns a ValidationError carrying the issues', async () => {
    const schema = z.object({ itemName: z.string() });
    const [err, parsed] = await validator({ itemName: 4 }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating data (itemName: Expected string, received number)');
    expect(getValidationError(err)?.issues).toHaveLength(1);
    expect(getValidationError(err)?.issues[0]?.path).toEqual(['itemName']);
  });

  it('returns error when sync validation throws', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => {
        throw new Error('oops');
      }),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start');
    expect(err?.cause).toStrictEqual(new Error('oops'));
  });

  it('returns error when async validation rejects', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => Promise.reject(new Error('oops'))),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating async data');
  });

  it('returns error when validation returns nothing', async () => {
    const [err, value] = await validator(
      'test',
      schemaOf(() => null),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validation returned no result');
  });

  it('resolves async results', async () => {
    const [err, value] = await validator(
      'test',
      schemaOf(() => Promise.resolve({ value: 'async' })),
    );

    expect(err).toBeNull();
    expect(value).toBe('async');
  });
});
