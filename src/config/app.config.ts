import dotenv from "dotenv";
dotenv.config();

const DEFAULT_CATALOG_URL = "https://raw.githubusercontent.com/AnuragPhatak/smartphones_dataset_cleanning/main/smartphones_new.csv";
const DEFAULT_PORT = 8000;

// Environment configuration, read on access rather than captured at import time
class AppConfig {
    static get port(): number {
        const raw = Number(process.env.PORT);
        return Number.isInteger(raw) && raw > 0 ? raw : DEFAULT_PORT;
    }

    static get catalogUrl(): string {
        return process.env.CATALOG_URL?.trim() || DEFAULT_CATALOG_URL;
    }

    // Local CSV takes precedence over the remote catalog when set
    static get catalogPath(): string | undefined {
        return process.env.CATALOG_PATH?.trim() || undefined;
    }

    static get isDebug(): boolean {
        return process.env.DEBUG === "true";
    }
}

export default AppConfig;
