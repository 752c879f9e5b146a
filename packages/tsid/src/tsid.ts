/**
 * Time-sorted IDs.
 *
 * 42 bits of milliseconds since 2020-01-01 followed by 22 bits that are
 * random at the start of each millisecond and count up within it. The value
 * is written as 13 Crockford Base32 characters, so string order is creation
 * order.
 */

import { randomInt } from 'node:crypto';

export const TSID_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
export const TSID_LENGTH = 13;

const EPOCH_MS = 1_577_836_800_000;
const SEQUENCE_BITS = 22n;
const SEQUENCE_LIMIT = 1 << Number(SEQUENCE_BITS);

export type Clock = () => number;

export interface TsidGenerator {
	next(): string;
}

/**
 * Generator with its own per-millisecond sequence. When the sequence wraps
 * inside one millisecond the timestamp is bumped forward, so output stays
 * strictly increasing even if the clock stalls or steps back.
 */
export function createTsidGenerator(clock: Clock = Date.now, random: (limit: number) => number = randomInt): TsidGenerator {
	let lastMillis = -1;
	let sequence = 0;

	return {
		next() {
			const millis = Math.max(clock() - EPOCH_MS, 0);
			if (millis > lastMillis) {
				lastMillis = millis;
				sequence = random(SEQUENCE_LIMIT);
			} else if (++sequence === SEQUENCE_LIMIT) {
				lastMillis += 1;
				sequence = 0;
			}
			return encode((BigInt(lastMillis) << SEQUENCE_BITS) | BigInt(sequence));
		},
	};
}

function encode(value: bigint): string {
	const chars: string[] = [];
	let rest = value;
	for (let i = 0; i < TSID_LENGTH; i++) {
		chars.push(TSID_ALPHABET.charAt(Number(rest & 31n)));
		rest >>= 5n;
	}
	return chars.reverse().join('');
}

const defaultGenerator = createTsidGenerator();

export function generateRaw(): string {
	return defaultGenerator.next();
}
