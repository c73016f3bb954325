import express from "express";
import recommendationRouter from "./recommendation.routes";
import catalogRouter from "./catalog.routes";

const router = express.Router();

router.use("/recommendations", recommendationRouter);
router.use("/catalog", catalogRouter);

export default router;
