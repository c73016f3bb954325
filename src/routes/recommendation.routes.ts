import express from "express";
import RecommendationController from "../controllers/recommendation.controller";

const recommendationRouter = express.Router();

recommendationRouter.post("/", RecommendationController.findPhones);

recommendationRouter.post("/chat", RecommendationController.chat);

export default recommendationRouter;
