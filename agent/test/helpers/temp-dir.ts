/**
 * Per-test scratch directory for identity and settings files
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

export interface TempDir {
	root: string;
	file(name: string): string;
	/**
	 * Write a file and give it a modification time later than any previous write,
	 * so mtime-based change detection always sees it.
	 */
	write(name: string, content: string): string;
	remove(name: string): void;
	cleanup(): void;
}

export function createTempDir(prefix = 'grid-device-'): TempDir {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
	let writes = 0;
	const baseSeconds = Math.floor(Date.now() / 1000);

	const file = (name: string) => path.join(root, name);

	return {
		root,
		file,
		write(name, content) {
			const target = file(name);
			fs.writeFileSync(target, content, 'utf-8');
			writes++;
			const mtime = baseSeconds + writes * 10;
			fs.utimesSync(target, mtime, mtime);
			return target;
		},
		remove(name) {
			fs.rmSync(file(name), { force: true });
		},
		cleanup() {
			fs.rmSync(root, { recursive: true, force: true });
		},
	};
}

export function identityJson(deviceId = 'dev-42', power = 100): string {
	return JSON.stringify({ device_id: deviceId, power });
}
