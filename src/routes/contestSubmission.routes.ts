import { Router } from "express";
import * as subCtrl from "../controllers/contestSubmission.controller";
import { checkAuth } from "../middleware/auth.middleware";

const router = Router();

router.get("/submissions/:id", checkAuth, subCtrl.submissionDetail);

router.post("/:slug/submit", checkAuth, subCtrl.submit);
router.get("/:slug/leaderboard", subCtrl.leaderboard);
router.get("/:slug/leaderboard/detailed", subCtrl.detailedLeaderboard);
router.get("/:slug/my-dashboard", checkAuth, subCtrl.myDashboard);
router.get("/:slug/my-submissions", checkAuth, subCtrl.mySubmissions);

export default router;
