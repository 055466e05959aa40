import { describe, it, expect } from "vitest";
import { extractResourceGroup, lastSegment, vmResourceId } from "./resource-id.js";

describe("extractResourceGroup", () => {
  it("reads the fifth path segment", () => {
    expect(
      extractResourceGroup("/subscriptions/sub-1/resourceGroups/rg-web/providers/Microsoft.Compute/virtualMachines/web-01"),
    ).toBe("rg-web");
  });

  it("returns Unknown for missing or short IDs", () => {
    expect(extractResourceGroup(undefined)).toBe("Unknown");
    expect(extractResourceGroup("")).toBe("Unknown");
    expect(extractResourceGroup("/subscriptions/sub-1")).toBe("Unknown");
  });
});

describe("vmResourceId", () => {
  it("builds the compute provider path", () => {
    expect(vmResourceId("sub-1", "rg-web", "web-01")).toBe(
      "/subscriptions/sub-1/resourceGroups/rg-web/providers/Microsoft.Compute/virtualMachines/web-01",
    );
  });
});

describe("lastSegment", () => {
  it("returns the text after the final slash", () => {
    expect(lastSegment("Microsoft.Sql/servers/databases")).toBe("databases");
    expect(lastSegment("plain")).toBe("plain");
  });
});
