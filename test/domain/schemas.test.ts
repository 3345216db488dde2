import { describe, it, expect } from 'vitest';
import {
  crossCheckRequestInput,
  crossCheckStatusSchema,
  mimeTypeSchema,
  severitySchema,
} from '../../src/domain/schemas.js';

describe('crossCheckRequestInput', () => {
  it('accepts valid input', () => {
    const result = crossCheckRequestInput.safeParse({
      imageBase64: 'dGVzdA==',
      mimeType: 'image/png',
      mrzText: 'P<UTOERIKSSON<<ANNA<MARIA',
      filename: 'passport.png',
      includeMetadata: true,
    });
    expect(result.success).toBe(true);
  });

  it('accepts without optional fields', () => {
    const result = crossCheckRequestInput.safeParse({
      imageBase64: 'dGVzdA==',
      mimeType: 'image/jpeg',
    });
    expect(result.success).toBe(true);
  });

  it('rejects empty imageBase64', () => {
    const result = crossCheckRequestInput.safeParse({ imageBase64: '', mimeType: 'image/jpeg' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Image data is required');
    }
  });

  it('rejects unsupported mime type', () => {
    const result = crossCheckRequestInput.safeParse({ imageBase64: 'dGVzdA==', mimeType: 'application/pdf' });
    expect(result.success).toBe(false);
  });

  it('rejects empty mrzText', () => {
    const result = crossCheckRequestInput.safeParse({ imageBase64: 'dGVzdA==', mimeType: 'image/png', mrzText: '' });
    expect(result.success).toBe(false);
  });
});

describe('enum schemas', () => {
  it('accepts the three statuses', () => {
    expect(crossCheckStatusSchema.safeParse('success').success).toBe(true);
    expect(crossCheckStatusSchema.safeParse('partial').success).toBe(true);
    expect(crossCheckStatusSchema.safeParse('error').success).toBe(true);
    expect(crossCheckStatusSchema.safeParse('done').success).toBe(false);
  });

  it('accepts known severities only', () => {
    expect(severitySchema.safeParse('critical').success).toBe(true);
    expect(severitySchema.safeParse('fatal').success).toBe(false);
  });

  it('accepts image mime types', () => {
    expect(mimeTypeSchema.safeParse('image/webp').success).toBe(true);
    expect(mimeTypeSchema.safeParse('image/tiff').success).toBe(false);
  });
});
