import type { Request, Response } from "express";
import CatalogService from "../services/catalog.service";
import { BUDGET_SLIDER, PRIORITIES } from "../config/recommendation.config";
import { sendFailure, sendSuccess } from "./response.helper";

class CatalogController {
    // Everything the preference form needs: priorities, slider bounds, brand multiselect options
    static async getOptions(_req: Request, res: Response) {
        try {
            const catalog = await CatalogService.load();
            return sendSuccess(res, "Catalog options fetched successfully", {
                priorities: PRIORITIES,
                budget: {
                    min: BUDGET_SLIDER.min,
                    max: BUDGET_SLIDER.max,
                    defaultRange: BUDGET_SLIDER.defaultRange
                },
                brands: catalog.brands
            });
        } catch (error) {
            return sendFailure(res, error);
        }
    }

    static async getStats(_req: Request, res: Response) {
        try {
            return sendSuccess(res, "Catalog stats fetched successfully", CatalogService.getStats());
        } catch (error) {
            return sendFailure(res, error);
        }
    }
}

export default CatalogController;
