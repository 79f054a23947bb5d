/**
 * Text Extraction Tests
 */

import { describe, it, expect } from 'vitest';

import { decodePlainText, isDocumentType, isTextLike } from '../textExtraction';

const encode = (text: string) => new TextEncoder().encode(text);

describe('isTextLike', () => {
  it('should accept text types and structured text types', () => {
    expect(isTextLike('text/plain')).toBe(true);
    expect(isTextLike('text/markdown; charset=utf-8')).toBe(true);
    expect(isTextLike('Application/JSON')).toBe(true);
  });

  it('should fall back to the file extension', () => {
    expect(isTextLike('application/octet-stream', 'journal.MD')).toBe(true);
    expect(isTextLike('application/octet-stream', 'photo.jpg')).toBe(false);
    expect(isTextLike('image/png', null)).toBe(false);
  });
});

describe('isDocumentType', () => {
  it('should recognise documents that need a parser', () => {
    expect(isDocumentType('application/pdf')).toBe(true);
    expect(isDocumentType('text/plain')).toBe(false);
  });
});

describe('decodePlainText', () => {
  it('should drop the BOM, normalize line endings and collapse blank lines', () => {
    expect(decodePlainText(encode('\uFEFFHello\r\n\r\n\r\n\r\nWorld  \n'))).toBe('Hello\n\nWorld');
  });

  it('should return null for whitespace only', () => {
    expect(decodePlainText(encode(' \n\t\n'))).toBeNull();
  });
});
