import { Router } from "express";
import submissionRoutes from "./submission.routes";
import contestSubmissionRoutes from "./contestSubmission.routes";
import progressRoutes from "./progress.routes";
import { health } from "../controllers/health.controller";

const router = Router();

router.get("/health", health);
router.use("/api/submissions", submissionRoutes);
router.use("/api/contests", contestSubmissionRoutes);
router.use("/api/progress", progressRoutes);

export default router;
