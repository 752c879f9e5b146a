import { describe, it, expect } from 'vitest';
import { createTsidGenerator, generateRaw, TSID_ALPHABET, TSID_LENGTH } from '../tsid.js';

const EPOCH_MS = Date.UTC(2020, 0, 1);

describe('createTsidGenerator', () => {
	it('should encode the epoch with a zero sequence as all zeros', () => {
		const generator = createTsidGenerator(() => EPOCH_MS, () => 0);

		expect(generator.next()).toBe('0000000000000');
		expect(generator.next()).toBe('0000000000001');
	});

	it('should move to the next millisecond when the sequence wraps', () => {
		const generator = createTsidGenerator(() => EPOCH_MS, (limit) => limit - 1);

		expect(generator.next()).toBe('000000003ZZZZ');
		expect(generator.next()).toBe('0000000040000');
	});

	it('should keep increasing when the clock steps back', () => {
		let now = EPOCH_MS + 5;
		const generator = createTsidGenerator(() => now, () => 0);

		const first = generator.next();
		now = EPOCH_MS + 2;
		const second = generator.next();

		expect(first).toBe('00000000M0000');
		expect(second).toBe('00000000M0001');
	});

	it('should clamp times before the epoch', () => {
		expect(createTsidGenerator(() => 0, () => 0).next()).toBe('0000000000000');
	});
});

describe('generateRaw', () => {
	it('should return 13 Crockford characters', () => {
		const id = generateRaw();

		expect(id).toHaveLength(TSID_LENGTH);
		expect([...id].every((char) => TSID_ALPHABET.includes(char))).toBe(true);
	});

	it('should be unique and sorted under rapid generation', () => {
		const ids = Array.from({ length: 5000 }, () => generateRaw());

		expect(new Set(ids).size).toBe(5000);
		expect(ids).toEqual([...ids].sort());
	});
});
