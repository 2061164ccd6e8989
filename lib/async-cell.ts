export {
    AsyncCell
};

import type {AsyncState} from "./async-state.js";
import {currentData, idle, loading} from "./async-state.js";
import {Cell} from "./cell.js";

/** A {@link Cell} holding the {@link AsyncState} of an asynchronous operation. Every transition
    replaces the state and notifies, even if the new state looks like the old one. */
abstract class AsyncCell<T> extends Cell<AsyncState<T>> {
    private current: AsyncState<T>;
    
    protected constructor(initial: AsyncState<T> = loading()) {
        super();
        
        this.current = initial;
    }
    
    get value(): AsyncState<T> { return this.current; }
    
    /** Same as `value`. */
    get state(): AsyncState<T> { return this.current; }
    
    /** The best known value (see {@link currentData}). */
    get data(): T | undefined { return currentData(this.current); }
    
    /** Go back to {@link Idle}. */
    reset() { this.transition(idle()); }
    
    protected transition(state: AsyncState<T>) {
        this.current = state;
        this.notify();
    }
}
