import { describe, it, expect } from 'vitest';
import { toStoredDocument } from '../../src/cli/commands/load.js';
import { DedupError, ErrorCodes } from '../../src/core/errors.js';

describe('toStoredDocument', () => {
  it('should take the id out of the fields and keep the timestamp field', () => {
    expect(
      toStoredDocument({ id: 'a', timestamp: 5, title: 'CAC' }, 'id', 'timestamp', 'in:1')
    ).toEqual({ id: 'a', timestamp: 5, fields: { timestamp: 5, title: 'CAC' } });
  });

  it('should accept numeric ids', () => {
    expect(toStoredDocument({ id: 7, timestamp: 1 }, 'id', 'timestamp', 'in:1').id).toBe('7');
  });

  it('should parse ISO timestamps', () => {
    const document = toStoredDocument(
      { uuid: 'u-1', published: '2024-01-01T00:00:00Z' },
      'uuid',
      'published',
      'in:1'
    );

    expect(document.timestamp).toBe(1_704_067_200_000);
    expect(document.fields).toEqual({ published: '2024-01-01T00:00:00Z' });
  });

  it('should reject a line without an id', () => {
    expect(() => toStoredDocument({ timestamp: 1 }, 'id', 'timestamp', 'in:3')).toThrow(
      'Invalid in:3: missing "id"'
    );
  });

  it('should reject an unusable timestamp', () => {
    expect(() =>
      toStoredDocument({ id: 'a', timestamp: 'sometime' }, 'id', 'timestamp', 'in:4')
    ).toThrow('Invalid in:4: missing or unparseable "timestamp"');
  });

  it('should reject values that are not objects', () => {
    let caught: unknown;
    try {
      toStoredDocument(['a', 1], 'id', 'timestamp', 'in:5');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DedupError);
    expect(caught).toMatchObject({
      code: ErrorCodes.INVALID_PARAMETER,
      message: 'Invalid in:5: expected a JSON object',
    });
  });
});
