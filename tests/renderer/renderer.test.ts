import { describe, it, expect } from "vitest";
import { withRendererSession } from "../../src/renderer/renderer.js";
import { silentLogger } from "../../src/utils/logger.js";
import { FakeRenderer, FakeRendererFactory } from "../helpers/fakes.js";

describe("withRendererSession", () => {
  it("closes the session after a successful run", async () => {
    const factory = new FakeRendererFactory();
    const size = await withRendererSession(factory, silentLogger(), async (r) => {
      const image = await r.render("<p>x</p>", { width: 100, height: 50 });
      return [image.width, image.height];
    });
    expect(size).toEqual([100, 50]);
    expect(factory.session.closed).toBe(true);
  });

  it("closes the session when the work throws", async () => {
    const factory = new FakeRendererFactory();
    await expect(
      withRendererSession(factory, silentLogger(), async () => {
        throw new Error("work failed");
      })
    ).rejects.toThrow("work failed");
    expect(factory.session.closed).toBe(true);
  });

  it("keeps the work's error when closing also fails", async () => {
    const factory = new FakeRendererFactory(new FakeRenderer(() => false, new Error("close failed")));
    await expect(
      withRendererSession(factory, silentLogger(), async () => {
        throw new Error("work failed");
      })
    ).rejects.toThrow("work failed");
  });

  it("propagates a failure to open", async () => {
    const factory = new FakeRendererFactory(new FakeRenderer(), new Error("no chromium"));
    await expect(
      withRendererSession(factory, silentLogger(), async () => "unreached")
    ).rejects.toThrow("no chromium");
  });
});
