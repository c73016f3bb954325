import CatalogService from "./catalog.service";
import { getErrorMessage } from "../models/errors.model";

class AppStarterService {
    private static signalsRegistered = false;

    static async onStartApp(): Promise<boolean> {
        console.log("Starting Phone Recommendation System...");
        this.registerShutdownHandlers();

        // A failed warm-up is not fatal: the next request retries the load
        try {
            await CatalogService.load();
            return true;
        } catch (error) {
            console.error(`Initial catalog load failed: ${getErrorMessage(error)}`);
            return false;
        }
    }

    static onStopApp(): void {
        CatalogService.teardown();
    }

    private static registerShutdownHandlers(): void {
        if (this.signalsRegistered) return;
        this.signalsRegistered = true;

        const shutdown = () => {
            AppStarterService.onStopApp();
            process.exit(0);
        };
        process.on("SIGINT", shutdown);
        process.on("SIGTERM", shutdown);
    }
}

export default AppStarterService;
