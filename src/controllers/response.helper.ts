import type { Response } from "express";
import AppConfig from "../config/app.config";
import { getErrorMessage, isCatalogError } from "../models/errors.model";

export function sendSuccess(res: Response, message: string, data: unknown) {
    return res.status(200).json({
        success: true,
        message,
        data
    });
}

export function sendFailure(res: Response, error: unknown) {
    if (isCatalogError(error)) {
        if (error.status >= 500) {
            console.error(`${error.name}: ${error.message}`);
        }
        return res.status(error.status).json({
            success: false,
            message: error.message,
            code: error.code,
            retryable: error.retryable,
            data: error.code === "VALIDATION_ERROR" ? { errors: error.details } : null
        });
    }

    console.error("Unhandled request error:", AppConfig.isDebug ? error : getErrorMessage(error));
    return res.status(500).json({
        success: false,
        message: "An Unknown Error Occured",
        data: null
    });
}
