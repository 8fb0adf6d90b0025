import { Request, Response } from "express";
import * as activityService from "../services/activity.service";
import { handleError } from "../utils/error.util";
import { currentUser, queryNumber, queryString } from "./submission.controller";

/** 📈 Solved counts, streak and achievements */
export const myProgress = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await activityService.getUserProgress(user.id));
    } catch (err) {
        handleError(res, err);
    }
};

/** 📅 Activity calendar for the last year */
export const myActivity = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await activityService.getActivityCalendar(user.id));
    } catch (err) {
        handleError(res, err);
    }
};

export const solvedProblems = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await activityService.getSolvedProblems(user.id, queryString(req.query.difficulty)));
    } catch (err) {
        handleError(res, err);
    }
};

export const attemptedProblems = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await activityService.getAttemptedProblems(user.id));
    } catch (err) {
        handleError(res, err);
    }
};

/** 🌍 Top solvers across all practice problems */
export const globalLeaderboard = async (req: Request, res: Response) => {
    try {
        res.json(await activityService.getGlobalLeaderboard(queryNumber(req.query.limit)));
    } catch (err) {
        handleError(res, err);
    }
};

export const achievements = async (_req: Request, res: Response) => {
    try {
        res.json(await activityService.listAchievements());
    } catch (err) {
        handleError(res, err);
    }
};
