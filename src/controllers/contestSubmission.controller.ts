import { Request, Response } from "express";
import * as contestSubmissionService from "../services/contestSubmission.service";
import * as rankingService from "../services/ranking.service";
import { handleError } from "../utils/error.util";
import { currentUser } from "./submission.controller";

/** 🚀 Submit code during a running contest */
export const submit = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        const submission = await contestSubmissionService.submitContestSolution(req.params.slug, user.id, req.body);
        res.status(201).json({ message: "Submission judged", submission });
    } catch (err) {
        handleError(res, err);
    }
};

/** 🏆 Leaderboard */
export const leaderboard = async (req: Request, res: Response) => {
    try {
        res.json(await rankingService.getLeaderboard(req.params.slug));
    } catch (err) {
        handleError(res, err);
    }
};

export const detailedLeaderboard = async (req: Request, res: Response) => {
    try {
        res.json(await rankingService.getDetailedLeaderboard(req.params.slug));
    } catch (err) {
        handleError(res, err);
    }
};

/** 📊 Participant dashboard */
export const myDashboard = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await contestSubmissionService.getMyDashboard(req.params.slug, user.id));
    } catch (err) {
        handleError(res, err);
    }
};

export const mySubmissions = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await contestSubmissionService.getMyContestSubmissions(req.params.slug, user.id));
    } catch (err) {
        handleError(res, err);
    }
};

export const submissionDetail = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await contestSubmissionService.getContestSubmissionDetail(req.params.id, user));
    } catch (err) {
        handleError(res, err);
    }
};
