import { beforeEach, describe, expect, it } from "vitest";
import { MemoryDirectory } from "../src/adapters/directory.memory";

describe("MemoryDirectory", () => {
  let directory: MemoryDirectory;

  beforeEach(() => {
    directory = new MemoryDirectory();
  });

  it("should record ownership", () => {
    directory.recordOwnership("user-1", "a");

    expect(directory.owned("user-1")).toEqual(["a"]);
    expect(directory.shortlisted("user-1")).toEqual([]);
    expect(directory.listFor("user-1")).toEqual(["a"]);
  });

  it("should append a shortlist entry only once", () => {
    expect(directory.recordShortlist("user-2", "a")).toBe(true);
    expect(directory.recordShortlist("user-2", "a")).toBe(false);

    expect(directory.shortlisted("user-2")).toEqual(["a"]);
    expect(directory.listFor("user-2")).toEqual(["a"]);
  });

  it("should refuse to shortlist a listing the user owns", () => {
    directory.recordOwnership("user-1", "a");

    expect(directory.recordShortlist("user-1", "a")).toBe(false);
    expect(directory.shortlisted("user-1")).toEqual([]);
  });

  it("should merge both relations in recording order", () => {
    directory.recordOwnership("user-1", "a");
    directory.recordShortlist("user-1", "b");
    directory.recordOwnership("user-1", "c");

    expect(directory.owned("user-1")).toEqual(["a", "c"]);
    expect(directory.shortlisted("user-1")).toEqual(["b"]);
    expect(directory.listFor("user-1")).toEqual(["a", "b", "c"]);
  });

  it("should keep users independent", () => {
    directory.recordShortlist("user-1", "a");

    expect(directory.recordShortlist("user-2", "a")).toBe(true);
    expect(directory.listFor("user-3")).toEqual([]);
  });

  it("should hand out copies of the relations", () => {
    directory.recordOwnership("user-1", "a");

    directory.owned("user-1").push("b");
    directory.listFor("user-1").push("b");

    expect(directory.owned("user-1")).toEqual(["a"]);
    expect(directory.listFor("user-1")).toEqual(["a"]);
  });
});
