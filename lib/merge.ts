export {
    MergedNotifier,
    merge
};

import type {Observable, Subscription} from "./notifier.js";
import {DerivedNotifier} from "./notifier.js";

/** Notifies whenever any of its sources does (once per source notification). */
class MergedNotifier extends DerivedNotifier {
    private upstream: readonly Subscription[] = [];
    
    constructor(
        private readonly sources: readonly Observable[]
    ) {
        super();
    }
    
    protected subscribeToDeps() {
        const forward = () => this.notify();
        const subscriptions: Subscription[] = [];
        
        try {
            for (const source of this.sources) {
                subscriptions.push(source.subscribe(forward));
            }
        } catch (error) {
            for (const subscription of subscriptions) { subscription.unsubscribe(); }
            throw error;
        }
        
        this.upstream = subscriptions;
    }
    
    protected unsubscribeFromDeps() {
        for (const subscription of this.upstream) { subscription.unsubscribe(); }
        this.upstream = [];
    }
}

/** Create a {@link MergedNotifier} of sources, for consumers that depend on several cells. */
function merge(...sources: Observable[]): MergedNotifier {
    return new MergedNotifier(sources);
}
