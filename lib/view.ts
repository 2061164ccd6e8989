export type {
    ScopedHandle
};
export {
    listView, mapView, setView,
    scopedHandle
};

import {UnsupportedOperationError} from "./errors.js";

/* Read-only views are Proxies over the live backing collection: reads go straight through (so a
 * view is never stale and costs nothing to hand out) while every way of writing through one
 * throws. The static types (`readonly T[]`, `ReadonlyMap`, `ReadonlySet`) already lack the
 * mutators; the Proxy also covers callers that get around the types. */

function rejectMutation(what: PropertyKey): never {
    throw new UnsupportedOperationError(`Cannot ${String(what)} through a read-only view`);
}

function rejectingMutator(key: PropertyKey): () => never {
    return () => rejectMutation(key);
}

/* Property writes, deletes and the like. Shared by all three kinds of view. */
const rejectingTraps = {
    set: (_: object, key: PropertyKey): boolean => rejectMutation(`set ${String(key)}`),
    deleteProperty: (_: object, key: PropertyKey): boolean =>
        rejectMutation(`delete ${String(key)}`),
    defineProperty: (_: object, key: PropertyKey): boolean =>
        rejectMutation(`define ${String(key)}`),
    setPrototypeOf: (_: object): boolean => rejectMutation("set the prototype"),
    preventExtensions: (_: object): boolean => rejectMutation("prevent extensions")
};

const arrayMutators: ReadonlySet<PropertyKey> = new Set([
    "push", "pop", "shift", "unshift", "splice", "sort", "reverse", "fill", "copyWithin"
]);

/** A read-only view of vs. */
function listView<T>(vs: T[]): readonly T[] {
    return new Proxy<T[]>(vs, {
        get(target, key, receiver) {
            if (arrayMutators.has(key)) { return rejectingMutator(key); }
            
            // Methods run with `this` = the view, so callbacks get the view too:
            return Reflect.get(target, key, receiver);
        },
        ...rejectingTraps
    });
}

/* Map and Set methods only work on the real thing (internal slots), so have to be bound to the
 * target. Non-mutating methods that hand the collection to a callback get the view instead. */

function boundMember(target: object, key: PropertyKey): unknown {
    const member: unknown = Reflect.get(target, key, target);
    if (key === "constructor" || typeof member !== "function") { return member; }
    
    return member.bind(target);
}

/** A read-only view of map. */
function mapView<K, V>(map: Map<K, V>): ReadonlyMap<K, V> {
    const view: ReadonlyMap<K, V> = new Proxy<Map<K, V>>(map, {
        get(target, key) {
            switch (key) {
            case "set":
            case "delete":
            case "clear":
                return rejectingMutator(key);
            
            case "forEach":
                return (f: (v: V, k: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown) =>
                    target.forEach((v, k) => f.call(thisArg, v, k, view));
            
            default:
                return boundMember(target, key);
            }
        },
        ...rejectingTraps
    });
    
    return view;
}

/** A read-only view of set. */
function setView<T>(set: Set<T>): ReadonlySet<T> {
    const view: ReadonlySet<T> = new Proxy<Set<T>>(set, {
        get(target, key) {
            switch (key) {
            case "add":
            case "delete":
            case "clear":
                return rejectingMutator(key);
            
            case "forEach":
                return (f: (v: T, v2: T, set: ReadonlySet<T>) => void, thisArg?: unknown) =>
                    target.forEach((v) => f.call(thisArg, v, v, view));
            
            default:
                return boundMember(target, key);
            }
        },
        ...rejectingTraps
    });
    
    return view;
}

/** A mutable handle that only works until `revoke()` is called. */
interface ScopedHandle<C> {
    readonly handle: C;
    revoke: () => void;
}

/** Wrap target in a {@link ScopedHandle}. After `revoke()` any use of the handle (or of a method
    read from it) throws an {@link UnsupportedOperationError}. `forEach` callbacks get the handle,
    never the target, as their collection argument. */
function scopedHandle<C extends object>(target: C): ScopedHandle<C> {
    let revoked = false;
    const checkLive = (key: PropertyKey) => {
        if (revoked) {
            throw new UnsupportedOperationError(
                `Cannot use ${String(key)} of a mutable handle after its callback has returned`);
        }
    };
    const bindMethods = !Array.isArray(target);
    
    const handle: C = new Proxy(target, {
        get(target, key) {
            checkLive(key);
            
            if (!bindMethods) { return Reflect.get(target, key); }
            
            const member: unknown = Reflect.get(target, key, target);
            if (key === "constructor" || typeof member !== "function") { return member; }
            
            if (key === "forEach") {
                return (f: unknown, thisArg?: unknown) => {
                    checkLive(key);
                    if (typeof f !== "function") {
                        throw new TypeError(`${String(f)} is not a function`);
                    }
                    
                    Reflect.apply(member, target, [
                        (v: unknown, k: unknown) => Reflect.apply(f, thisArg, [v, k, handle])
                    ]);
                };
            }
            
            return (...args: unknown[]): unknown => {
                checkLive(key);
                const result: unknown = Reflect.apply(member, target, args);
                // Chaining (`map.set(k, v).set(...)`) must not leak the target:
                return result === target ? handle : result;
            };
        },
        set(target, key, v) {
            checkLive(key);
            return Reflect.set(target, key, v);
        },
        deleteProperty(target, key) {
            checkLive(key);
            return Reflect.deleteProperty(target, key);
        },
        has(target, key) {
            checkLive(key);
            return Reflect.has(target, key);
        }
    });
    
    return {handle, revoke: () => { revoked = true; }};
}
