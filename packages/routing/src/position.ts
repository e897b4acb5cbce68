/**
 * Log Position
 *
 * A point in the PostgreSQL write-ahead log. The text form (`pg_lsn`) is two
 * hexadecimal halves `X/Y` of a 64-bit byte offset, so `"9/0"` is ahead of
 * `"10/0"` under string comparison but behind it in the log. Ordering always
 * goes through the 64-bit value.
 */

import { ConfigurationError } from './errors.js';

const LSN_PATTERN = /^([0-9A-Fa-f]{1,8})\/([0-9A-Fa-f]{1,8})$/;

export type PositionOrder = -1 | 0 | 1;

export class LogPosition {
	static readonly ZERO = new LogPosition(0n);

	private constructor(readonly value: bigint) {}

	/**
	 * Parse `pg_lsn` text such as `"16/B374D848"`.
	 *
	 * @throws ConfigurationError if the text is not a valid log position
	 */
	static parse(text: string): LogPosition {
		const match = LSN_PATTERN.exec(text.trim());
		if (!match?.[1] || !match[2]) {
			throw new ConfigurationError(`Invalid log position: '${text}'`);
		}
		const high = BigInt(`0x${match[1]}`);
		const low = BigInt(`0x${match[2]}`);
		return new LogPosition((high << 32n) | low);
	}

	/**
	 * Build a position from its 64-bit byte offset.
	 */
	static fromBigInt(value: bigint): LogPosition {
		if (value < 0n || value > 0xffffffffffffffffn) {
			throw new ConfigurationError(`Log position out of range: ${value}`);
		}
		return new LogPosition(value);
	}

	compare(other: LogPosition): PositionOrder {
		if (this.value < other.value) return -1;
		if (this.value > other.value) return 1;
		return 0;
	}

	equals(other: LogPosition): boolean {
		return this.value === other.value;
	}

	/**
	 * True when a node that has replayed up to `replay` contains this position.
	 */
	isReachedBy(replay: LogPosition): boolean {
		return this.compare(replay) <= 0;
	}

	/**
	 * Bytes of log between `other` and this position; 0 when `other` is ahead.
	 */
	bytesAhead(other: LogPosition): bigint {
		return this.value > other.value ? this.value - other.value : 0n;
	}

	/**
	 * Position advanced by `bytes`.
	 */
	advance(bytes: bigint | number): LogPosition {
		return LogPosition.fromBigInt(this.value + BigInt(bytes));
	}

	toString(): string {
		const high = (this.value >> 32n).toString(16).toUpperCase();
		const low = (this.value & 0xffffffffn).toString(16).toUpperCase();
		return `${high}/${low}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
