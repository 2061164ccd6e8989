export type {
    StreamSource, BindOptions
};
export {
    StreamCell
};

import {Observable, from} from "rxjs";
import type {ObservableInput, Subscribable, Unsubscribable} from "rxjs";

import type {AsyncState} from "./async-state.js";
import {data, failure, loading, stackOf, streamCompleted} from "./async-state.js";
import {AsyncCell} from "./async-cell.js";

/** Anything a {@link StreamCell} can be bound to. A {@link Subscribable} is subscribed to as is, so
    it may keep emitting after an error (an rxjs Observable never does); anything else (promises,
    async iterables, arrays...) goes through rxjs `from()`. */
type StreamSource<T> = Subscribable<T> | ObservableInput<T>;

interface BindOptions {
    /** Unsubscribe from the source on its first error (default false). */
    cancelOnError?: boolean;
}

function isSubscribable<T>(source: StreamSource<T>): source is Subscribable<T> {
    return typeof source === "object" && source !== null
        && "subscribe" in source && typeof source.subscribe === "function";
}

/** One `bind()`. Events are only let through while it is the cell's current binding. */
class Binding {
    handle: Unsubscribable | undefined = undefined;
}

/** The state of a continuous asynchronous operation (a stream of values). Starts out
    {@link Loading} unless given another initial state.
    
    Holds at most one subscription: binding to a new source first cancels the old one, and events
    the old source sends anyway (or sent synchronously while being subscribed to) are ignored.
    
    A subscriber of this that throws while an event is being handled fails differently depending on
    the source. Under an rxjs Observable (including anything bound through `from()`) rxjs catches
    the error and reports it with `config.onUnhandledError` or, if that is not set, rethrows it from
    a timer as an uncaught exception. Under any other {@link Subscribable} it propagates to whatever
    called the observer. */
class StreamCell<T> extends AsyncCell<T> {
    private binding: Binding | undefined = undefined;
    
    constructor(initial?: AsyncState<T>) {
        super(initial);
    }
    
    /** Whether a subscription is currently held. */
    get isActive(): boolean { return this.binding !== undefined; }
    
    /** Cancel any current subscription, go to {@link Loading} (with the current data as previous
        data) and subscribe to source. Then every value goes to {@link Data}, every error to
        {@link Failure} (with the current data as previous data) and completion to
        {@link StreamCompleted} with the current data, releasing the subscription. An error also
        releases it if cancelOnError is set or the source is an rxjs Observable (which ends on its
        first error). */
    bind(source: StreamSource<T>, {cancelOnError = false}: BindOptions = {}) {
        this.cancel();
        this.transition(loading(this.data));
        
        const binding = new Binding();
        this.binding = binding;
        const isCurrent = () => this.binding === binding;
        
        const subscribable: Subscribable<T> =
            isSubscribable(source) ? source : from<ObservableInput<T>>(source);
        const endsOnError = subscribable instanceof Observable;
        const handle = subscribable.subscribe({
            next: (v) => {
                if (!isCurrent()) { return; }
                
                this.transition(data(v));
            },
            error: (error: unknown) => {
                if (!isCurrent()) { return; }
                
                if (cancelOnError || endsOnError) { this.cancel(); }
                this.transition(failure(error, stackOf(error), this.data));
            },
            complete: () => {
                if (!isCurrent()) { return; }
                
                this.binding = undefined;
                this.transition(streamCompleted(this.data));
            }
        });
        
        if (isCurrent()) {
            binding.handle = handle;
        } else {
            // Finished or cancelled before `subscribe` even returned:
            handle.unsubscribe();
        }
    }
    
    /** Unsubscribe from the current source, if any. The state stays as it is. */
    cancel() {
        const binding = this.binding;
        if (binding === undefined) { return; }
        
        this.binding = undefined;
        binding.handle?.unsubscribe();
    }
    
    /** Cancel and go back to {@link Idle}. */
    reset() {
        this.cancel();
        super.reset();
    }
    
    dispose() {
        this.cancel();
        super.dispose();
    }
}
