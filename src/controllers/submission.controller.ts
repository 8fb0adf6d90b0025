import { Request, Response } from "express";
import * as submissionService from "../services/submission.service";
import { HttpError, handleError } from "../utils/error.util";
import { AuthUser } from "../utils/jwt.util";

export const currentUser = (req: Request): AuthUser => {
    if (!req.user) throw new HttpError(401, "Authentication required");
    return req.user;
};

export const queryString = (value: unknown): string | undefined =>
    typeof value === "string" && value.length > 0 ? value : undefined;

export const queryNumber = (value: unknown): number | undefined => {
    const text = queryString(value);
    if (text === undefined) return undefined;
    const parsed = Number.parseInt(text, 10);
    if (Number.isNaN(parsed) || parsed < 0) throw new HttpError(400, "limit and offset must be non-negative integers");
    return parsed;
};

/** 🚀 Submit a practice solution (judged against every test case) */
export const submit = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        const submission = await submissionService.submitSolution(user.id, req.body);
        res.status(201).json({ message: "Submission judged", submission });
    } catch (err) {
        handleError(res, err);
    }
};

/** 🏃 Run against sample test cases only */
export const run = async (req: Request, res: Response) => {
    try {
        currentUser(req);
        const result = await submissionService.runSolution(req.body);
        res.json(result);
    } catch (err) {
        handleError(res, err);
    }
};

/** 📋 List submissions */
export const list = async (req: Request, res: Response) => {
    try {
        const submissions = await submissionService.listSubmissions({
            problemSlug: queryString(req.query.problem),
            verdict: queryString(req.query.verdict),
            language: queryString(req.query.language),
            username: queryString(req.query.username),
            limit: queryNumber(req.query.limit),
            offset: queryNumber(req.query.offset),
        });
        res.json(submissions);
    } catch (err) {
        handleError(res, err);
    }
};

export const mySubmissions = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await submissionService.getMySubmissions(user.id));
    } catch (err) {
        handleError(res, err);
    }
};

export const myStats = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await submissionService.getMyStats(user.id));
    } catch (err) {
        handleError(res, err);
    }
};

/** 🔍 Submission detail */
export const detail = async (req: Request, res: Response) => {
    try {
        const user = currentUser(req);
        res.json(await submissionService.getSubmissionDetail(req.params.id, user));
    } catch (err) {
        handleError(res, err);
    }
};
