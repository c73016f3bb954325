import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import AppStarterService from "./App.starter.service";
import CatalogService from "./catalog.service";
import { CatalogLoadError } from "../models/errors.model";

beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(process, "on").mockImplementation(() => process);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe("AppStarterService", () => {
    it("warms the catalog on start-up", async () => {
        const load = vi.spyOn(CatalogService, "load").mockResolvedValue(CatalogService.buildCatalog([], "test"));

        await expect(AppStarterService.onStartApp()).resolves.toBe(true);
        expect(load).toHaveBeenCalledTimes(1);
    });

    it("keeps running when the first catalog load fails", async () => {
        vi.spyOn(CatalogService, "load").mockRejectedValue(new CatalogLoadError("Catalog download failed with status 500", "test"));

        await expect(AppStarterService.onStartApp()).resolves.toBe(false);
        expect(console.error).toHaveBeenCalledWith("Initial catalog load failed: Catalog download failed with status 500");
    });

    it("releases the catalog on stop", () => {
        const teardown = vi.spyOn(CatalogService, "teardown");

        AppStarterService.onStopApp();

        expect(teardown).toHaveBeenCalledTimes(1);
    });
});
