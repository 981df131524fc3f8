/**
 * Tests for request command parsing
 */
import { describe, it, expect } from 'vitest';
import { parseBody, parseHeaders, parseMethod } from '../../src/commands/request.js';

describe('parseMethod', () => {
    it('should accept methods in any case', () => {
        expect(parseMethod('get')).toBe('GET');
        expect(parseMethod('Patch')).toBe('PATCH');
    });

    it('should reject unknown methods', () => {
        expect(parseMethod('FETCH')).toBeUndefined();
    });
});

describe('parseHeaders', () => {
    it('should split on the first colon and trim', () => {
        expect(parseHeaders(['X-Report: allocation', 'Accept:text/csv', 'X-Range: 09:00-17:00'])).toEqual({
            'X-Report': 'allocation',
            Accept: 'text/csv',
            'X-Range': '09:00-17:00',
        });
    });

    it('should return an empty object for no headers', () => {
        expect(parseHeaders([])).toEqual({});
    });

    it('should reject entries without a name', () => {
        expect(() => parseHeaders(['no-colon'])).toThrow('Invalid header "no-colon". Use "Name: value"');
        expect(() => parseHeaders([': value'])).toThrow('Invalid header ": value"');
    });
});

describe('parseBody', () => {
    it('should parse JSON bodies', () => {
        expect(parseBody('{"start_date":"2026-06-01"}')).toEqual({ start_date: '2026-06-01' });
    });

    it('should keep non-JSON bodies as text', () => {
        expect(parseBody('plain text')).toBe('plain text');
    });

    it('should return undefined without a body', () => {
        expect(parseBody(undefined)).toBeUndefined();
    });
});
