import { Router } from "express";
import * as submissionCtrl from "../controllers/submission.controller";
import { checkAuth } from "../middleware/auth.middleware";

const router = Router();

router.post("/submit", checkAuth, submissionCtrl.submit);
router.post("/run", checkAuth, submissionCtrl.run);
router.get("/", checkAuth, submissionCtrl.list);

// Move special routes ABOVE :id
router.get("/my-submissions", checkAuth, submissionCtrl.mySubmissions);
router.get("/my-stats", checkAuth, submissionCtrl.myStats);
router.get("/:id", checkAuth, submissionCtrl.detail); // 👈 keep this LAST

export default router;
