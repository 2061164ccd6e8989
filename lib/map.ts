export {
    MapCell
};

import {CollectionCell} from "./collection.js";
import {mapView} from "./view.js";

/** Whether v, gotten with `get(k)`, is a value of the map: V may include undefined so that alone
    does not tell, present (`has(k)`) does. */
function found<V>(v: V | undefined, present: boolean): v is V { return present; }

/** An observable {@link Map}.
    
    Key assignment (`set`, `update`, `setAll` of at least one entry...) always notifies, whether or
    not the new value equals the old one. Removals notify only if a key was actually removed and
    `putIfAbsent` only if the key was absent. */
class MapCell<K, V>
    extends CollectionCell<ReadonlyMap<K, V>, Map<K, V>, Iterable<readonly [K, V]>>
{
    constructor(initial: Iterable<readonly [K, V]> = []) {
        const map = new Map(initial);
        super(map, mapView(map));
    }
    
    get size(): number { return this.backing.size; }
    
    get isEmpty(): boolean { return this.backing.size === 0; }
    
    // # Reads
    
    get(k: K): V | undefined { return this.backing.get(k); }
    
    has(k: K): boolean { return this.backing.has(k); }
    
    /** Whether some key maps to v (compared with ===). */
    containsValue(v: V): boolean {
        for (const u of this.backing.values()) {
            if (u === v) { return true; }
        }
        
        return false;
    }
    
    keys(): IterableIterator<K> { return this.backing.keys(); }
    
    values(): IterableIterator<V> { return this.backing.values(); }
    
    entries(): IterableIterator<[K, V]> { return this.backing.entries(); }
    
    [Symbol.iterator](): IterableIterator<[K, V]> { return this.backing.entries(); }
    
    forEach(f: (v: V, k: K, map: ReadonlyMap<K, V>) => void) { this.value.forEach(f); }
    
    /** A new plain Map of the entries converted by convert. */
    mapEntries<K2, V2>(convert: (k: K, v: V) => readonly [K2, V2]): Map<K2, V2> {
        const result = new Map<K2, V2>();
        
        for (const [k, v] of this.backing) {
            const [k2, v2] = convert(k, v);
            result.set(k2, v2);
        }
        
        return result;
    }
    
    /** A mutable copy of the contents. */
    toMap(): Map<K, V> { return new Map(this.backing); }
    
    // # Writes
    
    /** Map k to v. Always notifies. */
    set(k: K, v: V): this {
        this.backing.set(k, v);
        this.notify();
        
        return this;
    }
    
    /** Set every entry of entries (notifies only if there were any). */
    setAll(entries: Iterable<readonly [K, V]>) {
        const written = Array.from(entries);
        if (written.length === 0) { return; }
        
        for (const [k, v] of written) {
            this.backing.set(k, v);
        }
        this.notify();
    }
    
    /** The value of k, first mapping k to ifAbsent() if k was not present (only then
        notifying). */
    putIfAbsent(k: K, ifAbsent: () => V): V {
        const existing = this.backing.get(k);
        if (found(existing, this.backing.has(k))) { return existing; }
        
        const v = ifAbsent();
        this.backing.set(k, v);
        this.notify();
        
        return v;
    }
    
    /** Map k to f(its value) or, if k is absent, to ifAbsent(). Without ifAbsent an absent key is a
        RangeError. Returns the new value. */
    update(k: K, f: (v: V) => V, ifAbsent?: () => V): V {
        const existing = this.backing.get(k);
        let v: V;
        if (found(existing, this.backing.has(k))) {
            v = f(existing);
        } else if (ifAbsent !== undefined) {
            v = ifAbsent();
        } else {
            throw new RangeError(`Key not in map: ${String(k)}`);
        }
        
        this.backing.set(k, v);
        this.notify();
        
        return v;
    }
    
    /** Map every key k to f(k, its value) (notifies only if there were any). */
    updateAll(f: (k: K, v: V) => V) {
        if (this.backing.size === 0) { return; }
        
        const updated = Array.from(this.backing, ([k, v]): [K, V] => [k, f(k, v)]);
        for (const [k, v] of updated) {
            this.backing.set(k, v);
        }
        this.notify();
    }
    
    // # Removals
    
    /** Remove k. Returns whether it was present (only then notifying). */
    delete(k: K): boolean {
        if (!this.backing.delete(k)) { return false; }
        
        this.notify();
        
        return true;
    }
    
    /** Remove k and return the value it had (undefined and no notification if absent). */
    remove(k: K): V | undefined {
        if (!this.backing.has(k)) { return undefined; }
        
        const v = this.backing.get(k);
        this.backing.delete(k);
        this.notify();
        
        return v;
    }
    
    /** Remove every entry for which pred returns true. */
    removeWhere(pred: (k: K, v: V) => boolean) {
        const doomed = Array.from(this.backing).filter(([k, v]) => pred(k, v));
        if (doomed.length === 0) { return; }
        
        for (const [k] of doomed) {
            this.backing.delete(k);
        }
        this.notify();
    }
    
    /** Remove everything (notifies only if there was something). */
    clear() {
        if (this.backing.size === 0) { return; }
        
        this.backing.clear();
        this.notify();
    }
    
    // # CollectionCell
    
    protected collect(contents: Iterable<readonly [K, V]>): Map<K, V> { return new Map(contents); }
    
    protected load(contents: Map<K, V>) {
        this.backing.clear();
        
        for (const [k, v] of contents) {
            this.backing.set(k, v);
        }
    }
    
    protected copy(): Map<K, V> { return new Map(this.backing); }
}
