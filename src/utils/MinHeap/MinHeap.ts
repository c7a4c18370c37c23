// Binary min-heap; equal keys pop in insertion order.
export class MinHeap<T> {
  private a: { k: number; seq: number; v: T }[] = [];
  private pushed = 0;
  size() {
    return this.a.length;
  }
  push(k: number, v: T) {
    this.a.push({ k, seq: this.pushed++, v });
    this.bubbleUp(this.a.length - 1);
  }
  pop(): T | undefined {
    const top = this.a[0];
    const last = this.a.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.a.length) {
      this.a[0] = last;
      this.bubbleDown(0);
    }
    return top.v;
  }
  peekKey(): number | undefined {
    return this.a[0]?.k;
  }
  private less(i: number, j: number) {
    const x = this.a[i],
      y = this.a[j];
    return x.k < y.k || (x.k === y.k && x.seq < y.seq);
  }
  private bubbleUp(i: number) {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(i, p)) break;
      [this.a[p], this.a[i]] = [this.a[i], this.a[p]];
      i = p;
    }
  }
  private bubbleDown(i: number) {
    const n = this.a.length;
    while (true) {
      const l = i * 2 + 1,
        r = l + 1;
      let m = i;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) break;
      [this.a[m], this.a[i]] = [this.a[i], this.a[m]];
      i = m;
    }
  }
}
