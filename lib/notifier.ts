export type {
    Subscriber, Observable
};
export {
    Subscription,
    Notifier, DerivedNotifier
};

import {DisposedError, NotifyError} from "./errors.js";

/** A callback that is told that something changed. It gets no arguments; re-read the
    {@link Observable} to find out what the change was. */
type Subscriber = () => void;

/** An object that can inform {@link Subscriber}s of changes. */
interface Observable {
    /** Add a {@link Subscriber}. The returned {@link Subscription} identifies this particular
        call, so the same callback can be subscribed (and unsubscribed) more than once. */
    subscribe: (subscriber: Subscriber) => Subscription;
    
    /** Remove the {@link Subscriber} that subscription was returned for. */
    unsubscribe: (subscription: Subscription) => void;
    
    /** Call all {@link Subscriber}s. */
    notify: () => void;
}

/** Token returned by {@link Observable.subscribe}. */
class Subscription {
    constructor(
        private readonly source: Observable,
        readonly subscriber: Subscriber
    ) {}
    
    /** Same as `source.unsubscribe(this)`. */
    unsubscribe() { this.source.unsubscribe(this); }
}

/** An {@link Observable} that stores its subscriptions in a {@link Set} (so in subscription order,
    with constant time removal) and can be disposed.
    
    `notify()` calls the subscribers that were subscribed when it was called: a subscriber added
    during the round is first called on the next one and a subscriber removed during the round is
    still called in it. Every subscriber is called even if some throw; afterwards a single failure
    is rethrown as is and several are thrown together as a {@link NotifyError}.
    
    After `dispose()`, `notify()` is a no-op (late asynchronous completions may still try to
    notify) but `subscribe()` throws a {@link DisposedError}. */
abstract class Notifier implements Observable {
    /** The internal set of subscriptions. */
    private readonly subscribers = new Set<Subscription>();
    private disposed = false;
    
    get isDisposed(): boolean { return this.disposed; }
    
    get hasSubscribers(): boolean { return this.subscribers.size > 0; }
    
    subscribe(subscriber: Subscriber): Subscription {
        if (this.disposed) { throw new DisposedError(this.constructor.name); }
        
        const subscription = new Subscription(this, subscriber);
        this.subscribers.add(subscription);
        
        return subscription;
    }
    
    unsubscribe(subscription: Subscription) {
        this.subscribers.delete(subscription);
    }
    
    notify() {
        if (this.disposed || this.subscribers.size === 0) { return; }
        
        const errors: unknown[] = [];
        
        for (const {subscriber} of Array.from(this.subscribers)) {
            try {
                subscriber();
            } catch (error) {
                errors.push(error);
            }
        }
        
        if (errors.length === 1) {
            throw errors[0];
        } else if (errors.length > 1) {
            throw new NotifyError(errors);
        }
    }
    
    /** Drop all subscribers and stop notifying. Idempotent. */
    dispose() {
        this.disposed = true;
        this.subscribers.clear();
    }
}

/** A {@link Notifier} that subscribes to its own dependencies while it itself has subscribers. */
abstract class DerivedNotifier extends Notifier {
    private attached = false;
    
    /** Subscribe to dependencies (called when this gets its first subscriber). */
    protected abstract subscribeToDeps(): void;
    /** Unsubscribe from dependencies (called when this loses its last subscriber). */
    protected abstract unsubscribeFromDeps(): void;
    
    /** Whether this is currently subscribed to its dependencies. */
    protected get isAttached(): boolean { return this.attached; }
    
    subscribe(subscriber: Subscriber): Subscription {
        if (!this.attached && !this.isDisposed) {
            /* To avoid space leaks and 'unused' updates to `this` only start watching
             * dependencies when `this` gets its first watcher: */
            this.subscribeToDeps();
            this.attached = true;
        }
        
        return super.subscribe(subscriber);
    }
    
    unsubscribe(subscription: Subscription) {
        super.unsubscribe(subscription);
        
        if (this.attached && !this.hasSubscribers) {
            /* Watcher count just became zero, but watchees still have pointers to `this`.
             * Remove those to avoid space leaks and 'unused' updates to `this`: */
            this.detach();
        }
    }
    
    dispose() {
        if (this.attached) { this.detach(); }
        
        super.dispose();
    }
    
    private detach() {
        this.attached = false;
        this.unsubscribeFromDeps();
    }
}
