import { afterEach, describe, it, expect, vi } from 'vitest';
import { main, parseArgs } from '../main.js';

describe('parseArgs', () => {
	it('should split positionals from options', () => {
		expect(parseArgs(['migrate', 'c8047e2d6f13', '--env-file', 'local.env'])).toEqual({
			positionals: ['migrate', 'c8047e2d6f13'],
			options: { 'env-file': 'local.env' },
		});
	});

	it('should keep a trailing flag without value as a positional', () => {
		expect(parseArgs(['report', '--verbose'])).toEqual({ positionals: ['report', '--verbose'], options: {} });
	});
});

describe('main', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should print usage for help', async () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

		expect(await main(['help'])).toBe(0);
		expect(log).toHaveBeenCalledTimes(1);
		expect(String(log.mock.calls[0]?.[0])).toMatch(/^Usage: shop <command>/);
	});

	it('should fail on an unknown command', async () => {
		const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
		vi.spyOn(console, 'log').mockImplementation(() => undefined);

		expect(await main(['explode'])).toBe(1);
		expect(error).toHaveBeenCalledWith('Unknown command: explode\n');
	});

	it('should print usage when no command is given', async () => {
		vi.spyOn(console, 'log').mockImplementation(() => undefined);

		expect(await main([])).toBe(0);
	});
});
