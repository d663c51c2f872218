import { describe, expect, it } from "vitest";
import { FreeList, type FreeLinks } from "../free_list";
import { SlotTable } from "../../slot/slot_table";
import { END_OF_FREE_LIST } from "../../utils/constants";

function table_with(n: number): SlotTable<string> {
  const t = new SlotTable<string>();
  for (let i = 0; i < n; i++) t.append_vacant();
  return t;
}

describe("FreeList", () => {
  //=========================================================
  // push / pop
  //=========================================================

  it("starts empty", () => {
    const list = new FreeList(table_with(0));
    expect(list.is_empty).toBe(true);
    expect(list.head).toBe(END_OF_FREE_LIST);
    expect(list.pop()).toBeUndefined();
  });

  it("pops in LIFO order", () => {
    const list = new FreeList(table_with(4));
    list.push(0);
    list.push(2);
    list.push(3);
    expect(list.pop()).toBe(3);
    expect(list.pop()).toBe(2);
    expect(list.pop()).toBe(0);
    expect(list.pop()).toBeUndefined();
    expect(list.is_empty).toBe(true);
  });

  it("threads the chain through the link column", () => {
    const t = table_with(3);
    const list = new FreeList(t);
    list.push(1);
    list.push(2);
    expect(list.head).toBe(2);
    expect(t.link_of(2)).toBe(1);
    expect(t.link_of(1)).toBe(END_OF_FREE_LIST);
  });

  it("a popped index can be pushed again", () => {
    const list = new FreeList(table_with(2));
    list.push(0);
    list.push(1);
    const index = list.pop();
    expect(index).toBe(1);
    list.push(1);
    expect([...list.indices()]).toEqual([1, 0]);
  });

  //=========================================================
  // thread_fresh
  //=========================================================

  it("thread_fresh hands out a fresh run in ascending order", () => {
    const list = new FreeList(table_with(5));
    list.thread_fresh(0, 5);
    expect([...list.indices()]).toEqual([0, 1, 2, 3, 4]);
  });

  it("thread_fresh sits on top of existing vacancies", () => {
    const list = new FreeList(table_with(5));
    list.push(0);
    list.thread_fresh(3, 5);
    expect([...list.indices()]).toEqual([3, 4, 0]);
  });

  it("thread_fresh with an empty run is a no-op", () => {
    const list = new FreeList(table_with(1));
    list.thread_fresh(0, 0);
    expect(list.is_empty).toBe(true);
  });

  //=========================================================
  // Any link column
  //=========================================================

  it("works over any FreeLinks implementation", () => {
    const links: number[] = [];
    const column: FreeLinks = {
      link_of: (i) => links[i],
      set_link: (i, link) => {
        links[i] = link;
      },
    };
    const list = new FreeList(column);
    list.push(7);
    list.push(9);
    expect(links[9]).toBe(7);
    expect(list.pop()).toBe(9);
    expect(list.pop()).toBe(7);
  });
});
