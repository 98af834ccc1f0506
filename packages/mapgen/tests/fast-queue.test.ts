import { describe, expect, it } from "vitest";
import { FastQueue } from "../src/core/data-structures";

describe("FastQueue", () => {
  it("dequeues in insertion order", () => {
    const queue = new FastQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);
    queue.enqueue(3);

    expect(queue.length).toBe(3);
    expect(queue.dequeue()).toBe(1);
    expect(queue.dequeue()).toBe(2);
    expect(queue.dequeue()).toBe(3);
    expect(queue.dequeue()).toBeUndefined();
    expect(queue.isEmpty).toBe(true);
  });

  it("keeps order across compaction", () => {
    const queue = new FastQueue<number>();
    for (let i = 0; i < 3000; i++) queue.enqueue(i);
    for (let i = 0; i < 2500; i++) queue.dequeue();

    expect(queue.length).toBe(500);
    expect(queue.dequeue()).toBe(2500);
  });
});
