import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ConfigValidationError, TemplateRenderError } from '@statusboard/core';
import { z } from 'zod';

import { PageAssetError, mapErrorToResponse } from '../src/errors';

test('page rendering failures map to 500', () => {
  assert.deepEqual(mapErrorToResponse(new TemplateRenderError('Unknown template placeholder "x"')), {
    statusCode: 500,
    message: 'Failed to generate page'
  });
  assert.deepEqual(mapErrorToResponse(new PageAssetError('Failed to read template file')), {
    statusCode: 500,
    message: 'Failed to generate page'
  });
});

test('request validation failures map to 400', () => {
  const result = z.object({ pretty: z.enum(['true', 'false']) }).safeParse({ pretty: 'maybe' });
  assert.equal(result.success, false);
  if (!result.success) {
    const mapped = mapErrorToResponse(result.error);
    assert.equal(mapped.statusCode, 400);
    assert.equal(mapped.message, 'Request validation failed');
  }
});

test('anything else is an unexpected 500 without details', () => {
  assert.deepEqual(mapErrorToResponse(new ConfigValidationError('Configuration failed validation', [])), {
    statusCode: 500,
    message: 'Unexpected error'
  });
  assert.deepEqual(mapErrorToResponse('boom'), { statusCode: 500, message: 'Unexpected error' });
});
