import { sleep } from '../../../src/lib/sleep';

describe('sleep', () => {
	it('should resolve true once the delay elapsed', async () => {
		await expect(sleep(5)).resolves.toBe(true);
	});

	it('should resolve false as soon as the signal aborts', async () => {
		const controller = new AbortController();
		const startedAt = Date.now();

		const pending = sleep(60000, controller.signal);
		controller.abort();

		await expect(pending).resolves.toBe(false);
		expect(Date.now() - startedAt).toBeLessThan(1000);
	});

	it('should not wait at all on an already aborted signal', async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(sleep(60000, controller.signal)).resolves.toBe(false);
	});
});
