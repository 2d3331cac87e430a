import { describe, it, expect } from "vitest";
import { withFileLock } from "./lock.js";

const tick = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("withFileLock", () => {
  it("runs writers of one file in arrival order", async () => {
    const order: string[] = [];
    const write = (label: string, ms: number) =>
      withFileLock("/state/tags.json", async () => {
        order.push(`${label}-start`);
        await tick(ms);
        order.push(`${label}-end`);
        return label;
      });

    const results = await Promise.all([write("a", 20), write("b", 5), write("c", 0)]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(order).toEqual(["a-start", "a-end", "b-start", "b-end", "c-start", "c-end"]);
  });

  it("lets different files proceed together", async () => {
    const order: string[] = [];
    const write = (path: string) =>
      withFileLock(path, async () => {
        order.push(`${path}-start`);
        await tick(20);
        order.push(`${path}-end`);
      });

    await Promise.all([write("/state/tags/one.json"), write("/state/tags/two.json")]);

    expect(order.slice(0, 2)).toEqual(["/state/tags/one.json-start", "/state/tags/two.json-start"]);
  });

  it("releases the file when a writer fails", async () => {
    const failed = withFileLock("/state/tags/broken.json", async () => {
      throw new Error("disk full");
    });
    const next = withFileLock("/state/tags/broken.json", async () => "written");

    await expect(failed).rejects.toThrow("disk full");
    await expect(next).resolves.toBe("written");
  });
});
