import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

import { ZodValidationPipe } from './zod.validation.pipe';

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(z.object({ page: z.coerce.number().int().min(1).default(1) }).strict());

  it('returns the parsed value', () => {
    expect(pipe.transform({ page: '3' })).toEqual({ page: 3 });
    expect(pipe.transform({})).toEqual({ page: 1 });
  });

  it('reports every issue with its path', () => {
    let caught: unknown;
    try {
      pipe.transform({ page: '0', extra: true });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(BadRequestException);
    const response = caught instanceof BadRequestException ? caught.getResponse() : null;
    expect(response).toMatchObject({
      message: 'Validation failed',
      issues: expect.arrayContaining([
        expect.objectContaining({ path: 'page', code: 'too_small' }),
        expect.objectContaining({ path: '', code: 'unrecognized_keys' }),
      ]),
    });
  });
});
