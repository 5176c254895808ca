import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MapSessionStore } from "../src";

const NOW = Date.UTC(2026, 0, 1);

describe("MapSessionStore", () => {
    beforeEach(() => {
        vi.useFakeTimers({ toFake: ["Date"] });
        vi.setSystemTime(NOW);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it("supports set/get/remove", async () => {
        const store = new MapSessionStore<{ userId: string }>();

        await store.set("sid-1", { userId: "u1" }, 60);
        await expect(store.get("sid-1")).resolves.toEqual({ userId: "u1" });

        await store.remove("sid-1");
        await expect(store.get("sid-1")).resolves.toBeNull();
        await expect(store.remove("never-set")).resolves.toBeUndefined();

        await store.close();
    });

    it("returns a copy rather than the stored object", async () => {
        const store = new MapSessionStore<{ roles: string[] }>();
        const value = { roles: ["admin"] };

        await store.set("sid", value, 60);
        value.roles.push("owner");

        await expect(store.get("sid")).resolves.toEqual({ roles: ["admin"] });
        await store.close();
    });

    it("expires entries at the boundary second", async () => {
        const store = new MapSessionStore<{ n: number }>();

        await store.set("zero", { n: 0 }, 0);
        await store.set("short", { n: 1 }, 5);

        await expect(store.get("zero")).resolves.toBeNull();
        vi.setSystemTime(NOW + 4_000);
        await expect(store.get("short")).resolves.toEqual({ n: 1 });
        vi.setSystemTime(NOW + 5_000);
        await expect(store.get("short")).resolves.toBeNull();

        await store.close();
    });

    it("evicts the oldest entry when full", async () => {
        const store = new MapSessionStore<{ n: number }>({ maxSize: 2 });

        await store.set("a", { n: 1 }, 60);
        await store.set("b", { n: 2 }, 60);
        await store.set("b", { n: 3 }, 60);
        expect(store.size).toBe(2);

        await store.set("c", { n: 4 }, 60);

        expect(store.size).toBe(2);
        await expect(store.get("a")).resolves.toBeNull();
        await expect(store.get("b")).resolves.toEqual({ n: 3 });
        await store.close();
    });

    it("drops expired entries before evicting live ones", async () => {
        const store = new MapSessionStore<{ n: number }>({ maxSize: 2 });

        await store.set("a", { n: 1 }, 60);
        await store.set("stale", { n: 2 }, 1);
        vi.setSystemTime(NOW + 2_000);
        await store.set("c", { n: 3 }, 60);

        await expect(store.get("a")).resolves.toEqual({ n: 1 });
        await expect(store.get("c")).resolves.toEqual({ n: 3 });
        expect(store.size).toBe(2);
        await store.close();
    });

    it("stores values with the configured codec", async () => {
        const store = new MapSessionStore<{ n: number }>({ serializer: "yaml" });

        await store.set("sid", { n: 1 }, 60);

        await expect(store.get("sid")).resolves.toEqual({ n: 1 });
        await store.close();
    });

    it("rejects invalid keys and ttl", async () => {
        const store = new MapSessionStore();

        await expect(store.set("", {}, 60)).rejects.toMatchObject({ code: "INVALID_KEY" });
        await expect(store.set("k", {}, -5)).rejects.toMatchObject({ code: "INVALID_TTL" });
        await store.close();
    });
});
