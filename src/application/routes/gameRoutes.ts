import { Router } from "express";
import { gameController } from "@/infrastructure/controllers/gameController";

const router = Router();

router.get("/health", gameController.healthCheck);
router.get("/api/game/screen", gameController.getScreen);
router.get("/api/game/state", gameController.getState);
router.post("/api/game/input", gameController.submitInput);
router.post("/api/sim/command", gameController.submitCommand);

export default router;
