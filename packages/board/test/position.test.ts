import { describe, it, expect } from "vitest";
import { after, before, between, first } from "../src/core/position.js";

describe("positions", () => {
  it("starts in the middle of the alphabet", () => {
    expect(first()).toBe("n");
  });

  it("places after and before", () => {
    expect(after("n")).toBe("t");
    expect(before("n")).toBe("g");
  });

  it("extends past z when appending", () => {
    expect(after("z")).toBe("zm");
    expect(after("zn")).toBe("zt");
  });

  it("takes the midpoint character where there is room", () => {
    expect(between("n", "t")).toBe("q");
    expect(between("n", "nm")).toBe("nf");
  });

  it("extends between adjacent characters", () => {
    expect(between("a", "b")).toBe("am");
    expect(between("n", "o")).toBe("nm");
    expect(between("am", "b")).toBe("at");
  });

  it("goes below positions that start outside the alphabet", () => {
    expect(before("`a")).toBe("`4");
    expect(before("`a") < "`a").toBe(true);
    expect(before("1")).toBe("0");
    expect(before("a")).toBe("4");
  });

  it("finds room between digit positions", () => {
    expect(between("1", "5")).toBe("3");
    expect(between("1", "2")).toBe("1m");
    expect(between("1", "a")).toBe("5");
  });

  it("goes after low when there is no room", () => {
    expect(between("n", "n")).toBe("t");
    expect(between("t", "n")).toBe("tm");
  });

  it("keeps finding room between a position and its last insert", () => {
    const low = "n";
    let high = "t";
    for (let i = 0; i < 15; i++) {
      const mid = between(low, high);
      expect(mid > low && mid < high).toBe(true);
      high = mid;
    }
  });

  it("never ends a position in a so there is room below it", () => {
    expect(before("c")).toBe("an");
    expect(before("an")).toBe("ag");
    expect(before("ac")).toBe("aan");
  });

  it("keeps finding room when prepending", () => {
    let position = first();
    for (let i = 0; i < 15; i++) {
      const next = before(position);
      expect(next < position && next > "").toBe(true);
      expect(next).toMatch(/^[a-z]+$/);
      position = next;
    }
  });

  it("keeps increasing when appending", () => {
    let position = first();
    for (let i = 0; i < 15; i++) {
      const next = after(position);
      expect(next > position).toBe(true);
      position = next;
    }
  });
});
