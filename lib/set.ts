export {
    SetCell
};

import {CollectionCell} from "./collection.js";
import {setView} from "./view.js";

/** An observable {@link Set}. Mutators notify only if membership actually changed; adding an
    element that is already there or removing one that is not is silent.
    
    The set algebra (`union`, `intersection`...) returns new plain sets and never touches this. */
class SetCell<T> extends CollectionCell<ReadonlySet<T>, Set<T>, Iterable<T>> {
    constructor(initial: Iterable<T> = []) {
        const set = new Set(initial);
        super(set, setView(set));
    }
    
    get size(): number { return this.backing.size; }
    
    get isEmpty(): boolean { return this.backing.size === 0; }
    
    /** The first element in insertion order. */
    get first(): T | undefined {
        for (const v of this.backing) { return v; }
        
        return undefined;
    }
    
    /** The last element in insertion order. */
    get last(): T | undefined {
        let last: T | undefined = undefined;
        for (const v of this.backing) { last = v; }
        
        return last;
    }
    
    // # Reads
    
    has(v: T): boolean { return this.backing.has(v); }
    
    /** Whether every element of vs is in this. */
    containsAll(vs: Iterable<T>): boolean {
        for (const v of vs) {
            if (!this.backing.has(v)) { return false; }
        }
        
        return true;
    }
    
    values(): IterableIterator<T> { return this.backing.values(); }
    
    [Symbol.iterator](): IterableIterator<T> { return this.backing.values(); }
    
    forEach(f: (v: T, v2: T, set: ReadonlySet<T>) => void) { this.value.forEach(f); }
    
    some(pred: (v: T) => boolean): boolean {
        for (const v of this.backing) {
            if (pred(v)) { return true; }
        }
        
        return false;
    }
    
    every(pred: (v: T) => boolean): boolean { return !this.some((v) => !pred(v)); }
    
    find(pred: (v: T) => boolean): T | undefined {
        for (const v of this.backing) {
            if (pred(v)) { return v; }
        }
        
        return undefined;
    }
    
    /** A new plain set of the elements for which pred returns true. */
    filter(pred: (v: T) => boolean): Set<T> {
        const result = new Set<T>();
        
        for (const v of this.backing) {
            if (pred(v)) { result.add(v); }
        }
        
        return result;
    }
    
    /** The elements transformed by f, in insertion order. */
    map<U>(f: (v: T) => U): U[] { return Array.from(this.backing, f); }
    
    /** A mutable copy of the contents. */
    toSet(): Set<T> { return new Set(this.backing); }
    
    toArray(): T[] { return Array.from(this.backing); }
    
    // # Algebra
    
    union(that: Iterable<T>): Set<T> {
        const result = new Set(this.backing);
        
        for (const v of that) { result.add(v); }
        
        return result;
    }
    
    intersection(that: Iterable<T>): Set<T> {
        const other = new Set(that);
        
        return this.filter((v) => other.has(v));
    }
    
    difference(that: Iterable<T>): Set<T> {
        const other = new Set(that);
        
        return this.filter((v) => !other.has(v));
    }
    
    /** The elements that are in exactly one of this and that. */
    symmetricDifference(that: Iterable<T>): Set<T> {
        const result = new Set(this.backing);
        
        for (const v of new Set(that)) {
            if (this.backing.has(v)) {
                result.delete(v);
            } else {
                result.add(v);
            }
        }
        
        return result;
    }
    
    isSubsetOf(that: Iterable<T>): boolean {
        const other = new Set(that);
        
        return this.every((v) => other.has(v));
    }
    
    isSupersetOf(that: Iterable<T>): boolean { return this.containsAll(that); }
    
    // # Mutators
    
    /** Add v. Returns whether it was absent (only then notifying). */
    add(v: T): boolean {
        if (this.backing.has(v)) { return false; }
        
        this.backing.add(v);
        this.notify();
        
        return true;
    }
    
    /** Add every element of vs (notifies only if any was absent). */
    addAll(vs: Iterable<T>) {
        const added = Array.from(vs);
        const sizeBefore = this.backing.size;
        
        for (const v of added) { this.backing.add(v); }
        
        if (this.backing.size !== sizeBefore) { this.notify(); }
    }
    
    /** Remove v. Returns whether it was present (only then notifying). */
    delete(v: T): boolean {
        if (!this.backing.delete(v)) { return false; }
        
        this.notify();
        
        return true;
    }
    
    /** Remove every element of vs (notifies only if any was present). */
    removeAll(vs: Iterable<T>) {
        const removed = Array.from(vs);
        const sizeBefore = this.backing.size;
        
        for (const v of removed) { this.backing.delete(v); }
        
        if (this.backing.size !== sizeBefore) { this.notify(); }
    }
    
    /** Remove every element that is not in vs. */
    retainAll(vs: Iterable<T>) {
        const retained = new Set(vs);
        
        this.removeDoomed((v) => !retained.has(v));
    }
    
    /** Remove every element for which pred returns true. */
    removeWhere(pred: (v: T) => boolean) {
        this.removeDoomed(pred);
    }
    
    /** Remove every element for which pred returns false. */
    retainWhere(pred: (v: T) => boolean) {
        this.removeDoomed((v) => !pred(v));
    }
    
    /** Remove everything (notifies only if there was something). */
    clear() {
        if (this.backing.size === 0) { return; }
        
        this.backing.clear();
        this.notify();
    }
    
    // # CollectionCell
    
    protected collect(contents: Iterable<T>): Set<T> { return new Set(contents); }
    
    protected load(contents: Set<T>) {
        this.backing.clear();
        
        for (const v of contents) { this.backing.add(v); }
    }
    
    protected copy(): Set<T> { return new Set(this.backing); }
    
    private removeDoomed(isDoomed: (v: T) => boolean) {
        const doomed = this.toArray().filter((v) => isDoomed(v));
        if (doomed.length === 0) { return; }
        
        for (const v of doomed) { this.backing.delete(v); }
        this.notify();
    }
}
