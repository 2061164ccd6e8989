export {
    TaskCell
};

import type {AsyncState} from "./async-state.js";
import {data, failure, loading, stackOf} from "./async-state.js";
import {AsyncCell} from "./async-cell.js";

/** The state of one-shot asynchronous operations (promise-returning functions). Starts out
    {@link Loading} unless given another initial state.
    
    Overlapping `start()`s are allowed and the last one wins: each start bumps the generation and an
    operation that completes after a newer start has been made is ignored. Nothing cancels the
    operation itself; its result is just dropped. */
class TaskCell<T> extends AsyncCell<T> {
    private runs = 0;
    
    constructor(initial?: AsyncState<T>) {
        super(initial);
    }
    
    /** How many times `start()` has been called (plus one if disposed). */
    get generation(): number { return this.runs; }
    
    /** Go to {@link Loading} (with the current data as previous data) and run operation. If this
        is still the latest start when it completes, go to {@link Data} with the result and return
        the result or, if it failed, go to {@link Failure} and return undefined. If it has been
        superseded, change nothing and return undefined.
        
        Failures of operation never reject the returned promise; subscribers throwing does. If they
        throw on the {@link Loading} notification, operation still runs and its completion is still
        handled before the returned promise rejects with that failure. */
    async start(operation: () => T | PromiseLike<T>): Promise<T | undefined> {
        const generation = ++this.runs;
        const previousData = this.data;
        let loadingFailure: {error: unknown} | undefined = undefined;
        try {
            this.transition(loading(previousData));
        } catch (error) {
            loadingFailure = {error};
        }
        
        // The executor runs operation right away and turns a synchronous throw into a rejection:
        const completion = new Promise<T>((resolve) => resolve(operation())).then(
            (result) => {
                if (generation !== this.runs) { return undefined; }
                
                this.transition(data(result));
                
                return result;
            },
            (error: unknown) => {
                if (generation === this.runs) {
                    this.transition(failure(error, stackOf(error), previousData));
                }
                
                return undefined;
            }
        );
        if (loadingFailure === undefined) { return completion; }
        
        const {error} = loadingFailure;
        return completion.then(() => Promise.reject(error));
    }
    
    /** Go to {@link Data}(v), whatever is running. */
    setData(v: T) { this.transition(data(v)); }
    
    /** Go to {@link Failure}(error) with the current data as previous data, whatever is running.
        stackContext defaults to {@link stackOf}(error). */
    setError(error: unknown, stackContext: string | undefined = stackOf(error)) {
        this.transition(failure(error, stackContext, this.data));
    }
    
    /** Also makes any running operation stale. */
    dispose() {
        ++this.runs;
        
        super.dispose();
    }
}
