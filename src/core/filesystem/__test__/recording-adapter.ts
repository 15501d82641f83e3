/**
 * Adapter wrapper for tests: records every call and can be told to fail
 * selected operations the way a real provider reports failure.
 */

import type { Readable } from 'stream';
import type { Adapter, AdapterConfig, AdapterResult } from '../adapter/types.js';
import { InMemoryAdapter } from '../adapter/in-memory.js';
import type { AdapterObject, Visibility } from '../types.js';

export const FIXED_TIME = 1700000000;

export class RecordingAdapter implements Adapter {
	readonly calls: string[] = [];
	readonly failing = new Set<string>();

	constructor(readonly inner: InMemoryAdapter = new InMemoryAdapter({ now: () => FIXED_TIME })) {}

	getAdapterType(): string {
		return 'recording';
	}

	callsTo(operation: string): string[] {
		return this.calls.filter(call => call.startsWith(`${operation}:`));
	}

	reset(): void {
		this.calls.length = 0;
		this.failing.clear();
	}

	has(path: string): Promise<AdapterObject | boolean> {
		return this.record('has', path, () => this.inner.has(path));
	}

	write(path: string, contents: string, config: AdapterConfig): Promise<AdapterResult> {
		return this.record('write', path, () => this.inner.write(path, contents, config));
	}

	writeStream(path: string, stream: Readable, config: AdapterConfig): Promise<AdapterResult> {
		return this.record('writeStream', path, () => this.inner.writeStream(path, stream, config));
	}

	update(path: string, contents: string): Promise<AdapterResult> {
		return this.record('update', path, () => this.inner.update(path, contents));
	}

	updateStream(path: string, stream: Readable): Promise<AdapterResult> {
		return this.record('updateStream', path, () => this.inner.updateStream(path, stream));
	}

	read(path: string): Promise<AdapterResult> {
		return this.record('read', path, () => this.inner.read(path));
	}

	readStream(path: string): Promise<AdapterResult> {
		return this.record('readStream', path, () => this.inner.readStream(path));
	}

	rename(path: string, newpath: string): Promise<boolean> {
		return this.record('rename', path, () => this.inner.rename(path, newpath));
	}

	copy(path: string, newpath: string): Promise<boolean> {
		return this.record('copy', path, () => this.inner.copy(path, newpath));
	}

	delete(path: string): Promise<boolean> {
		return this.record('delete', path, () => this.inner.delete(path));
	}

	deleteDir(dirname: string): Promise<boolean> {
		return this.record('deleteDir', dirname, () => this.inner.deleteDir(dirname));
	}

	createDir(dirname: string, config: AdapterConfig): Promise<AdapterResult> {
		return this.record('createDir', dirname, () => this.inner.createDir(dirname, config));
	}

	listContents(directory: string, recursive: boolean): Promise<AdapterObject[] | false> {
		return this.record('listContents', directory, () => this.inner.listContents(directory, recursive));
	}

	getMetadata(path: string): Promise<AdapterResult> {
		return this.record('getMetadata', path, () => this.inner.getMetadata(path));
	}

	getMimetype(path: string): Promise<AdapterResult> {
		return this.record('getMimetype', path, () => this.inner.getMimetype(path));
	}

	getTimestamp(path: string): Promise<AdapterResult> {
		return this.record('getTimestamp', path, () => this.inner.getTimestamp(path));
	}

	getVisibility(path: string): Promise<AdapterResult> {
		return this.record('getVisibility', path, () => this.inner.getVisibility(path));
	}

	getSize(path: string): Promise<AdapterResult> {
		return this.record('getSize', path, () => this.inner.getSize(path));
	}

	setVisibility(path: string, visibility: Visibility): Promise<AdapterResult> {
		return this.record('setVisibility', path, () => this.inner.setVisibility(path, visibility));
	}

	private async record<T>(operation: string, path: string, run: () => Promise<T>): Promise<T | false> {
		this.calls.push(`${operation}:${path}`);
		if (this.failing.has(operation)) {
			return false;
		}
		return run();
	}
}
