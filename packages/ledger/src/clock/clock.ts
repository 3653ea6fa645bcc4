/**
 * Trusted time source
 *
 * Deadlines are absolute Unix timestamps in seconds. The ledger reads the
 * current time once per operation through a Clock.
 */

export interface Clock {
	/** Current Unix time in seconds */
	now(): number;
}

export class SystemClock implements Clock {
	now(): number {
		return Math.floor(Date.now() / 1000);
	}
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
	private current: number;

	constructor(start = 1_700_000_000) {
		this.current = start;
	}

	now(): number {
		return this.current;
	}

	set(seconds: number): void {
		this.current = seconds;
	}

	advance(seconds: number): number {
		this.current += seconds;
		return this.current;
	}
}
