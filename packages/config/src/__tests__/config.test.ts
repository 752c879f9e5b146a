import { describe, it, expect } from 'vitest';
import { parseEnv, CommonEnvSchemas, z } from '../index.js';

const schema = z.object({
	PORT: CommonEnvSchemas.port,
	DEBUG: CommonEnvSchemas.boolean,
	ORIGINS: CommonEnvSchemas.stringArray,
	LIMIT: CommonEnvSchemas.positiveInt.prefault('60'),
	SECRET: z.string().min(1),
});

describe('parseEnv', () => {
	it('should apply defaults and transforms', () => {
		const env = parseEnv(schema, { SECRET: 'test-secret' });

		expect(env).toEqual({ PORT: 8000, DEBUG: false, ORIGINS: [], LIMIT: 60, SECRET: 'test-secret' });
	});

	it('should parse provided values', () => {
		const env = parseEnv(schema, {
			PORT: '9000',
			DEBUG: 'True',
			ORIGINS: ' http://a.test , ,http://b.test',
			LIMIT: '5',
			SECRET: 'test-secret',
		});

		expect(env.PORT).toBe(9000);
		expect(env.DEBUG).toBe(true);
		expect(env.ORIGINS).toEqual(['http://a.test', 'http://b.test']);
		expect(env.LIMIT).toBe(5);
	});

	it('should list every failing variable', () => {
		expect(() => parseEnv(schema, { PORT: '70000', LIMIT: '0' })).toThrow(/^Environment validation failed:\n/);

		try {
			parseEnv(schema, { PORT: '70000', LIMIT: '0' });
		} catch (error) {
			const message = error instanceof Error ? error.message : '';
			const keys = message
				.split('\n')
				.slice(1)
				.map((line) => line.trim().split(':')[0]);
			expect(keys).toEqual(['PORT', 'LIMIT', 'SECRET']);
		}
	});
});
