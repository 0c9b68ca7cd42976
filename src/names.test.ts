import { describe, expect, it } from "vitest";
import { createNameResolver } from "./names";

describe("createNameResolver", () => {
  const resolver = createNameResolver({ plexuser123: "Alice" });

  it("maps known usernames", () => {
    expect(resolver.resolve("plexuser123")).toBe("Alice");
  });

  it("passes unknown usernames through", () => {
    expect(resolver.resolve("someone")).toBe("someone");
  });

  it("is case-sensitive", () => {
    expect(resolver.resolve("PlexUser123")).toBe("PlexUser123");
  });
});
