/** Seconds since the Unix epoch. */
export interface Clock {
	now(): number;
}

export class SystemClock implements Clock {
	now(): number {
		return Math.floor(Date.now() / 1000);
	}
}

export class ManualClock implements Clock {
	constructor(private current = 0) {}

	now(): number {
		return this.current;
	}

	set(seconds: number) {
		this.current = seconds;
	}

	advance(seconds: number) {
		this.current += seconds;
	}
}
