import { describe, it, expect } from "vitest";
import { createTableStore } from "./factory.js";
import { FusionTableStore } from "./fusion.js";
import { SupabaseTableStore } from "./supabase.js";

describe("createTableStore", () => {
  it("builds the Fusion datasheet store", () => {
    const store = createTableStore({
      kind: "fusion",
      baseUrl: "https://tables.example.com/fusion/v1",
      token: "test-token",
      tableId: "dst-content",
      timeoutMs: 1000,
    });

    expect(store).toBeInstanceOf(FusionTableStore);
    expect(store.kind).toBe("fusion");
  });

  it("builds the Supabase store without touching the network", () => {
    const store = createTableStore({
      kind: "supabase",
      url: "https://project.supabase.co",
      key: "test-key",
      tableId: "content_items",
    });

    expect(store).toBeInstanceOf(SupabaseTableStore);
    expect(store.kind).toBe("supabase");
  });
});
