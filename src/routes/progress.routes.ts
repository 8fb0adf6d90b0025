import { Router } from "express";
import * as progressCtrl from "../controllers/progress.controller";
import { checkAuth } from "../middleware/auth.middleware";

const router = Router();

router.get("/me", checkAuth, progressCtrl.myProgress);
router.get("/activity", checkAuth, progressCtrl.myActivity);
router.get("/solved-problems", checkAuth, progressCtrl.solvedProblems);
router.get("/attempted-problems", checkAuth, progressCtrl.attemptedProblems);
router.get("/leaderboard", checkAuth, progressCtrl.globalLeaderboard);
router.get("/achievements", checkAuth, progressCtrl.achievements);

export default router;
