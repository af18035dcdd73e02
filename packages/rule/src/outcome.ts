export type Complete<T> = { status: 'complete'; value: T };

export type Suspended = { status: 'suspended' };

export type Failed<E> = { status: 'failed'; error: E };

/**
 * Outcome of a single parse step.
 *
 * `suspended` means the buffered input is not enough to decide; the step has
 * to be retried from the same position once more bytes have arrived.
 */
export type Poll<T, E> = Complete<T> | Suspended | Failed<E>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

const SUSPENDED: Suspended = Object.freeze({ status: 'suspended' });

export const complete = <T>(value: T): Complete<T> => {
	return { status: 'complete', value };
};

export const suspended = (): Suspended => SUSPENDED;

export const failed = <E>(error: E): Failed<E> => {
	return { status: 'failed', error };
};

export const isComplete = <T, E>(poll: Poll<T, E>): poll is Complete<T> => {
	return poll.status === 'complete';
};

export const isSuspended = <T, E>(poll: Poll<T, E>): poll is Suspended => {
	return poll.status === 'suspended';
};

export const isFailed = <T, E>(poll: Poll<T, E>): poll is Failed<E> => {
	return poll.status === 'failed';
};

export const intoResult = <T, E>(poll: Complete<T> | Failed<E>): Result<T, E> => {
	if (poll.status === 'complete') {
		return { ok: true, value: poll.value };
	} else {
		return { ok: false, error: poll.error };
	}
};
