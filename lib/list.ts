export {
    ListCell
};

import {CollectionCell} from "./collection.js";
import {listView} from "./view.js";

function checkIndex(i: number, length: number) {
    if (!Number.isInteger(i) || i < 0 || i >= length) {
        throw new RangeError(`Index ${i} out of range [0, ${length})`);
    }
}

function checkPosition(i: number, length: number) {
    if (!Number.isInteger(i) || i < 0 || i > length) {
        throw new RangeError(`Insertion index ${i} out of range [0, ${length}]`);
    }
}

function checkRange(start: number, end: number, length: number) {
    if (!Number.isInteger(start) || !Number.isInteger(end)
        || start < 0 || end < start || end > length
    ) {
        throw new RangeError(`Range [${start}, ${end}) out of range [0, ${length}]`);
    }
}

/** An observable array. Has the non-mutating array methods (callbacks are given the read-only view
    as the array argument) and mutators that notify once per call:
    
    - Single-element additions, removals and writes always notify.
    - `remove(v)` and calls that turn out not to change the length (`removeWhere` with a predicate
      that matches nothing, `push()` of nothing, `clear()` of an empty list...) do not.
    - Positional writes (`set`, `setAll`, `fill`...) notify whenever they write at least one slot,
      whether or not the new element equals the old one.
    - Reorderings (`sort`, `reverse`, `shuffle`) always notify.
    
    Out-of-range indices throw a {@link RangeError} and change nothing. */
class ListCell<T> extends CollectionCell<readonly T[], T[], Iterable<T>> {
    constructor(initial: Iterable<T> = []) {
        const vs = Array.from(initial);
        super(vs, listView(vs));
    }
    
    get length(): number { return this.backing.length; }
    
    /** Truncate to newLength (which must not exceed the current length). */
    set length(newLength: number) {
        if (!Number.isInteger(newLength) || newLength < 0 || newLength > this.backing.length) {
            throw new RangeError(`Cannot set length ${newLength} of a list of ${this.length}`);
        }
        if (newLength === this.backing.length) { return; }
        
        this.backing.length = newLength;
        this.notify();
    }
    
    get isEmpty(): boolean { return this.backing.length === 0; }
    
    get first(): T | undefined { return this.backing[0]; }
    
    set first(v: T) { this.set(0, v); }
    
    get last(): T | undefined { return this.backing[this.backing.length - 1]; }
    
    set last(v: T) { this.set(this.backing.length - 1, v); }
    
    // # Reads
    
    /** The element at i, counting from the end if i is negative (as `Array.prototype.at`). */
    at(i: number): T | undefined { return this.backing.at(i); }
    
    /** The element at i (0 <= i < length). */
    get(i: number): T {
        checkIndex(i, this.backing.length);
        
        return this.backing[i];
    }
    
    includes(v: T, fromIndex?: number): boolean { return this.backing.includes(v, fromIndex); }
    
    indexOf(v: T, fromIndex?: number): number { return this.backing.indexOf(v, fromIndex); }
    
    lastIndexOf(v: T, fromIndex: number = this.backing.length - 1): number {
        return this.backing.lastIndexOf(v, fromIndex);
    }
    
    find(pred: (v: T, i: number, list: readonly T[]) => boolean): T | undefined {
        return this.value.find(pred);
    }
    
    findIndex(pred: (v: T, i: number, list: readonly T[]) => boolean): number {
        return this.value.findIndex(pred);
    }
    
    some(pred: (v: T, i: number, list: readonly T[]) => boolean): boolean {
        return this.value.some(pred);
    }
    
    every(pred: (v: T, i: number, list: readonly T[]) => boolean): boolean {
        return this.value.every(pred);
    }
    
    forEach(f: (v: T, i: number, list: readonly T[]) => void) { this.value.forEach(f); }
    
    map<U>(f: (v: T, i: number, list: readonly T[]) => U): U[] { return this.value.map(f); }
    
    filter(pred: (v: T, i: number, list: readonly T[]) => boolean): T[] {
        return this.value.filter(pred);
    }
    
    flatMap<U>(f: (v: T, i: number, list: readonly T[]) => U | readonly U[]): U[] {
        return this.value.flatMap(f);
    }
    
    reduce<U>(f: (acc: U, v: T, i: number, list: readonly T[]) => U, acc: U): U {
        return this.value.reduce(f, acc);
    }
    
    reduceRight<U>(f: (acc: U, v: T, i: number, list: readonly T[]) => U, acc: U): U {
        return this.value.reduceRight(f, acc);
    }
    
    join(separator?: string): string { return this.backing.join(separator); }
    
    slice(start?: number, end?: number): T[] { return this.backing.slice(start, end); }
    
    concat(...items: (T | ConcatArray<T>)[]): T[] { return this.backing.concat(...items); }
    
    entries(): IterableIterator<[number, T]> { return this.value.entries(); }
    
    keys(): IterableIterator<number> { return this.value.keys(); }
    
    values(): IterableIterator<T> { return this.value.values(); }
    
    [Symbol.iterator](): IterableIterator<T> { return this.value.values(); }
    
    /** A mutable copy of the contents. */
    toArray(): T[] { return this.backing.slice(); }
    
    // # Additions
    
    /** Append v. */
    add(v: T) {
        this.backing.push(v);
        this.notify();
    }
    
    /** Append vs (notifies only if vs was not empty). */
    addAll(vs: Iterable<T>) {
        this.pushAll(Array.from(vs));
    }
    
    /** Append vs and return the new length (as `Array.prototype.push`). */
    push(...vs: T[]): number {
        this.pushAll(vs);
        
        return this.backing.length;
    }
    
    /** Prepend vs and return the new length (as `Array.prototype.unshift`). */
    unshift(...vs: T[]): number {
        if (vs.length > 0) {
            this.backing.unshift(...vs);
            this.notify();
        }
        
        return this.backing.length;
    }
    
    /** Insert v at index i (0 <= i <= length). */
    insert(i: number, v: T) {
        checkPosition(i, this.backing.length);
        
        this.backing.splice(i, 0, v);
        this.notify();
    }
    
    /** Insert vs at index i (0 <= i <= length). */
    insertAll(i: number, vs: Iterable<T>) {
        checkPosition(i, this.backing.length);
        const inserted = Array.from(vs);
        if (inserted.length === 0) { return; }
        
        this.backing.splice(i, 0, ...inserted);
        this.notify();
    }
    
    // # Removals
    
    /** Remove the first element === v, if any. Returns whether one was removed. */
    remove(v: T): boolean {
        const i = this.backing.indexOf(v);
        if (i === -1) { return false; }
        
        this.backing.splice(i, 1);
        this.notify();
        
        return true;
    }
    
    /** Remove and return the element at i (0 <= i < length). */
    removeAt(i: number): T {
        checkIndex(i, this.backing.length);
        
        const [v] = this.backing.splice(i, 1);
        this.notify();
        
        return v;
    }
    
    /** Remove and return the last element. Throws a RangeError if empty. */
    removeLast(): T {
        return this.removeAt(this.backing.length - 1);
    }
    
    /** Remove and return the last element, or undefined if empty (as `Array.prototype.pop`). */
    pop(): T | undefined {
        if (this.backing.length === 0) { return undefined; }
        
        const v = this.backing.pop();
        this.notify();
        
        return v;
    }
    
    /** Remove and return the first element, or undefined if empty (as `Array.prototype.shift`). */
    shift(): T | undefined {
        if (this.backing.length === 0) { return undefined; }
        
        const v = this.backing.shift();
        this.notify();
        
        return v;
    }
    
    /** Remove the elements at start <= i < end. */
    removeRange(start: number, end: number) {
        checkRange(start, end, this.backing.length);
        if (start === end) { return; }
        
        this.backing.splice(start, end - start);
        this.notify();
    }
    
    /** Remove every element for which pred returns true. */
    removeWhere(pred: (v: T) => boolean) {
        this.keepOnly(this.backing.filter((v) => !pred(v)));
    }
    
    /** Remove every element for which pred returns false. */
    retainWhere(pred: (v: T) => boolean) {
        this.keepOnly(this.backing.filter((v) => pred(v)));
    }
    
    /** As `Array.prototype.splice` (negative and out-of-range arguments are clamped the same way).
        Notifies if anything was removed or inserted. */
    splice(start: number, deleteCount?: number, ...vs: T[]): T[] {
        const removed = deleteCount === undefined
            ? this.backing.splice(start)
            : this.backing.splice(start, deleteCount, ...vs);
        
        if (removed.length > 0 || vs.length > 0) { this.notify(); }
        
        return removed;
    }
    
    /** Remove everything (notifies only if there was something). */
    clear() {
        if (this.backing.length === 0) { return; }
        
        this.backing.length = 0;
        this.notify();
    }
    
    // # Writes
    
    /** Replace the element at i (0 <= i < length) with v. Always notifies. */
    set(i: number, v: T) {
        checkIndex(i, this.backing.length);
        
        this.backing[i] = v;
        this.notify();
    }
    
    /** Overwrite elements from index i onwards with vs (which must fit). */
    setAll(i: number, vs: Iterable<T>) {
        const written = Array.from(vs);
        checkRange(i, i + written.length, this.backing.length);
        if (written.length === 0) { return; }
        
        this.write(i, written);
        this.notify();
    }
    
    /** Overwrite the elements at start <= i < end with the elements of vs, skipping the first
        skipCount of vs. vs must have enough elements. */
    setRange(start: number, end: number, vs: Iterable<T>, skipCount: number = 0) {
        checkRange(start, end, this.backing.length);
        const written = Array.from(vs).slice(skipCount, skipCount + end - start);
        if (written.length < end - start) {
            throw new RangeError(`Need ${end - start} elements after skipping ${skipCount}`);
        }
        if (written.length === 0) { return; }
        
        this.write(start, written);
        this.notify();
    }
    
    /** Overwrite the elements at start <= i < end with v. */
    fill(v: T, start: number = 0, end: number = this.backing.length) {
        checkRange(start, end, this.backing.length);
        if (start === end) { return; }
        
        this.backing.fill(v, start, end);
        this.notify();
    }
    
    /** Replace the elements at start <= i < end with vs (of any length). */
    replaceRange(start: number, end: number, vs: Iterable<T>) {
        checkRange(start, end, this.backing.length);
        const inserted = Array.from(vs);
        if (start === end && inserted.length === 0) { return; }
        
        this.backing.splice(start, end - start, ...inserted);
        this.notify();
    }
    
    // # Reorderings
    
    /** Sort in place with compare (as `Array.prototype.sort`). If compare throws, the order is left
        as it was. */
    sort(compare?: (x: T, y: T) => number): this {
        this.write(0, this.backing.slice().sort(compare));
        this.notify();
        
        return this;
    }
    
    reverse(): this {
        this.backing.reverse();
        this.notify();
        
        return this;
    }
    
    /** Shuffle in place (Fisher-Yates). random must return numbers in [0, 1). */
    shuffle(random: () => number = Math.random) {
        const shuffled = this.backing.slice();
        
        for (let i = shuffled.length - 1; i > 0; --i) {
            const j = Math.floor(random() * (i + 1));
            [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
        }
        
        this.write(0, shuffled);
        this.notify();
    }
    
    // # CollectionCell
    
    protected collect(contents: Iterable<T>): T[] { return Array.from(contents); }
    
    protected load(contents: T[]) {
        this.backing.length = 0;
        
        for (const v of contents) {
            this.backing.push(v);
        }
    }
    
    protected copy(): T[] { return this.backing.slice(); }
    
    private pushAll(vs: readonly T[]) {
        if (vs.length === 0) { return; }
        
        for (const v of vs) {
            this.backing.push(v);
        }
        this.notify();
    }
    
    private keepOnly(kept: T[]) {
        if (kept.length === this.backing.length) { return; }
        
        this.load(kept);
        this.notify();
    }
    
    private write(start: number, vs: readonly T[]) {
        for (let i = 0; i < vs.length; ++i) {
            this.backing[start + i] = vs[i];
        }
    }
}
