export {
    UnsupportedOperationError,
    DisposedError,
    NotifyError
};

/** Thrown on an attempt to mutate a collection through its read-only view, or through a mutable
    handle that has outlived its `batch`/`silent` callback. */
class UnsupportedOperationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UnsupportedOperationError";
    }
}

/** Thrown when subscribing to (or registering into) something that has been disposed. */
class DisposedError extends Error {
    constructor(
        /** Type name of the disposed object. */
        readonly owner: string
    ) {
        super(`${owner} has been disposed`);
        this.name = "DisposedError";
    }
}

/** Thrown by `notify()` once every subscriber has been called, when more than one of them threw.
    The individual failures are in `errors`, in subscription order. */
class NotifyError extends AggregateError {
    constructor(errors: readonly unknown[]) {
        super(errors, `${errors.length} subscribers threw during notification`);
        this.name = "NotifyError";
    }
}
