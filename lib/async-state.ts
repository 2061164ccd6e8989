export type {
    AsyncState,
    AsyncHandlers, PartialAsyncHandlers, AsyncHandlersWithPrevious
};
export {
    Idle, Loading, Data, Failure, StreamCompleted,
    idle, loading, data, failure, streamCompleted,
    dispatch, dispatchPartial, dispatchWithPrevious,
    currentData,
    isIdle, isLoading, hasData, hasError, isCompleted,
    stackOf
};

/** Nothing has been started (or the operation was reset). */
class Idle {
    readonly kind = "idle";
    
    constructor() { Object.freeze(this); }
}

/** An operation is under way. previousData is the best value known when it started, if any. */
class Loading<T> {
    readonly kind = "loading";
    
    constructor(readonly previousData?: T) { Object.freeze(this); }
}

/** The operation produced data. */
class Data<T> {
    readonly kind = "data";
    
    constructor(readonly data: T) { Object.freeze(this); }
}

/** The operation failed with error. stackContext is where (for diagnostics only) and
    previousData the best value known before the failure, if any. */
class Failure<T> {
    readonly kind = "error";
    
    constructor(
        readonly error: unknown,
        readonly stackContext: string | undefined,
        readonly previousData?: T
    ) {
        Object.freeze(this);
    }
}

/** A stream finished. lastData is the last value it produced, if any. */
class StreamCompleted<T> {
    readonly kind = "completed";
    
    constructor(readonly lastData?: T) { Object.freeze(this); }
}

/** The state of an asynchronous operation: exactly one of the five variants, which are immutable.
    Transitions replace the whole state. */
type AsyncState<T> = Idle | Loading<T> | Data<T> | Failure<T> | StreamCompleted<T>;

const theIdle = new Idle();

function idle(): Idle { return theIdle; }

function loading<T>(previousData?: T): Loading<T> { return new Loading(previousData); }

function data<T>(v: T): Data<T> { return new Data(v); }

/** A {@link Failure}; stackContext defaults to {@link stackOf}(error). */
function failure<T>(error: unknown, stackContext: string | undefined = stackOf(error),
    previousData?: T
): Failure<T> {
    return new Failure(error, stackContext, previousData);
}

function streamCompleted<T>(lastData?: T): StreamCompleted<T> {
    return new StreamCompleted(lastData);
}

/** Where error was thrown if it knows (an Error's stack), else where this was called. */
function stackOf(error: unknown): string | undefined {
    if (error instanceof Error && error.stack !== undefined) { return error.stack; }
    
    return new Error().stack;
}

// # Dispatch

/** One handler per variant. `completed` is optional, see {@link dispatch}. */
interface AsyncHandlers<T, R> {
    idle: () => R;
    loading: () => R;
    data: (data: T) => R;
    error: (error: unknown, stackContext: string | undefined) => R;
    completed?: (lastData: T | undefined) => R;
}

type PartialAsyncHandlers<T, R> = Partial<AsyncHandlers<T, R>>;

/** Like {@link AsyncHandlers} but `loading` and `error` also get the previous data. */
interface AsyncHandlersWithPrevious<T, R> {
    idle: () => R;
    loading: (previousData: T | undefined) => R;
    data: (data: T) => R;
    error: (error: unknown, stackContext: string | undefined, previousData: T | undefined) => R;
    completed?: (lastData: T | undefined) => R;
}

/* Without a `completed` handler a finished stream is shown as its last data or, if it never
 * produced any, as idle. */
function onCompleted<T, R>(
    state: StreamCompleted<T>,
    handlers: {idle: () => R, data: (data: T) => R, completed?: (lastData: T | undefined) => R}
): R {
    if (handlers.completed !== undefined) { return handlers.completed(state.lastData); }
    
    return state.lastData !== undefined ? handlers.data(state.lastData) : handlers.idle();
}

/** Call the handler for the variant state is and return what it returns. */
function dispatch<T, R>(state: AsyncState<T>, handlers: AsyncHandlers<T, R>): R {
    switch (state.kind) {
    case "idle": return handlers.idle();
    case "loading": return handlers.loading();
    case "data": return handlers.data(state.data);
    case "error": return handlers.error(state.error, state.stackContext);
    case "completed": return onCompleted(state, handlers);
    default: {
        const exhaust: never = state;
        return exhaust;
    }
    }
}

/** Like {@link dispatch} but with any handlers; orElse handles the variants without one (including
    a finished stream, which does not fall back to `data` or `idle` here). */
function dispatchPartial<T, R>(state: AsyncState<T>, handlers: PartialAsyncHandlers<T, R>,
    orElse: () => R
): R {
    switch (state.kind) {
    case "idle": return handlers.idle !== undefined ? handlers.idle() : orElse();
    case "loading": return handlers.loading !== undefined ? handlers.loading() : orElse();
    case "data": return handlers.data !== undefined ? handlers.data(state.data) : orElse();
    case "error":
        return handlers.error !== undefined
            ? handlers.error(state.error, state.stackContext)
            : orElse();
    case "completed":
        return handlers.completed !== undefined ? handlers.completed(state.lastData) : orElse();
    default: {
        const exhaust: never = state;
        return exhaust;
    }
    }
}

/** Like {@link dispatch} but passing previous data to the `loading` and `error` handlers. */
function dispatchWithPrevious<T, R>(state: AsyncState<T>, handlers: AsyncHandlersWithPrevious<T, R>
): R {
    switch (state.kind) {
    case "idle": return handlers.idle();
    case "loading": return handlers.loading(state.previousData);
    case "data": return handlers.data(state.data);
    case "error": return handlers.error(state.error, state.stackContext, state.previousData);
    case "completed": return onCompleted(state, handlers);
    default: {
        const exhaust: never = state;
        return exhaust;
    }
    }
}

/** The best known value whatever the state: the data, the previous data of a load or failure, the
    last data of a finished stream or, when idle, undefined. */
function currentData<T>(state: AsyncState<T>): T | undefined {
    switch (state.kind) {
    case "idle": return undefined;
    case "loading": return state.previousData;
    case "data": return state.data;
    case "error": return state.previousData;
    case "completed": return state.lastData;
    default: {
        const exhaust: never = state;
        return exhaust;
    }
    }
}

function isIdle<T>(state: AsyncState<T>): state is Idle { return state.kind === "idle"; }

function isLoading<T>(state: AsyncState<T>): state is Loading<T> {
    return state.kind === "loading";
}

function hasData<T>(state: AsyncState<T>): state is Data<T> { return state.kind === "data"; }

function hasError<T>(state: AsyncState<T>): state is Failure<T> { return state.kind === "error"; }

function isCompleted<T>(state: AsyncState<T>): state is StreamCompleted<T> {
    return state.kind === "completed";
}
