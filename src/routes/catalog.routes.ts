import express from "express";
import CatalogController from "../controllers/catalog.controller";

const catalogRouter = express.Router();

catalogRouter.get("/options", CatalogController.getOptions);

catalogRouter.get("/stats", CatalogController.getStats);

export default catalogRouter;
