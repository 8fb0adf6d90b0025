import swaggerJSDoc from "swagger-jsdoc";

const codeBody = (extra: Record<string, { type: string }>, required: string[]) => ({
  required: true,
  content: {
    "application/json": {
      schema: {
        required: [...required, "code", "language"],
        properties: {
          ...extra,
          code: { type: "string" },
          language: { type: "string", enum: ["PYTHON", "JAVA", "CPP", "JAVASCRIPT", "C"] },
        },
      },
    },
  },
});

const slugParam = { name: "slug", in: "path", required: true, schema: { type: "string" } };
const idParam = { name: "id", in: "path", required: true, schema: { type: "string" } };

const swaggerDefinition = {
  openapi: "3.0.0",
  info: {
    title: "Judge Service",
    version: "1.0.0",
    description: "Practice and contest judging through Judge0, statistics, leaderboards and user progress",
  },

  servers: [
    {
      url: "http://localhost:4000",
      description: "Local Development Server",
    },
  ],

  components: {
    securitySchemes: {
      bearerAuth: {
        type: "http",
        scheme: "bearer",
        bearerFormat: "JWT",
      },
    },

    schemas: {
      Submission: {
        type: "object",
        properties: {
          id: { type: "string" },
          problemId: { type: "string" },
          language: { type: "string" },
          verdict: { type: "string" },
          testCasesPassed: { type: "integer" },
          totalTestCases: { type: "integer" },
          executionTime: { type: "integer", nullable: true, description: "ms" },
          memoryUsed: { type: "integer", nullable: true, description: "KB" },
          submittedAt: { type: "string", format: "date-time" },
        },
      },

      LeaderboardEntry: {
        type: "object",
        properties: {
          rank: { type: "integer" },
          username: { type: "string" },
          totalScore: { type: "integer" },
          problemsSolved: { type: "integer" },
          totalTime: { type: "integer", description: "minutes" },
          penaltyTime: { type: "integer", description: "minutes" },
        },
      },
    },
  },

  security: [{ bearerAuth: [] }],

  paths: {
    // ---------------------------------------------------
    // PRACTICE SUBMISSIONS
    // ---------------------------------------------------
    "/api/submissions/submit": {
      post: {
        tags: ["Submissions"],
        summary: "Submit a solution to a practice problem",
        requestBody: codeBody({ problemSlug: { type: "string" } }, ["problemSlug"]),
        responses: {
          201: { description: "Judged submission" },
          400: { description: "Invalid code or language" },
          403: { description: "User is banned" },
          404: { description: "Problem not found" },
        },
      },
    },

    "/api/submissions/run": {
      post: {
        tags: ["Submissions"],
        summary: "Run code against the sample test cases without saving",
        requestBody: codeBody({ problemSlug: { type: "string" } }, ["problemSlug"]),
        responses: { 200: { description: "Per-sample results" } },
      },
    },

    "/api/submissions": {
      get: {
        tags: ["Submissions"],
        summary: "List submissions",
        parameters: ["problem", "verdict", "language", "username", "limit", "offset"].map((name) => ({
          name,
          in: "query",
          schema: { type: "string" },
        })),
        responses: { 200: { description: "Submissions, newest first" } },
      },
    },

    "/api/submissions/my-submissions": {
      get: { tags: ["Submissions"], summary: "My submissions", responses: { 200: { description: "OK" } } },
    },

    "/api/submissions/my-stats": {
      get: { tags: ["Submissions"], summary: "My verdict counts", responses: { 200: { description: "OK" } } },
    },

    "/api/submissions/{id}": {
      get: {
        tags: ["Submissions"],
        summary: "Submission detail (code and per-case results for the owner)",
        parameters: [idParam],
        responses: { 200: { description: "OK" }, 404: { description: "Not found" } },
      },
    },

    // ---------------------------------------------------
    // CONTESTS
    // ---------------------------------------------------
    "/api/contests/{slug}/submit": {
      post: {
        tags: ["Contests"],
        summary: "Submit a solution during a running contest",
        parameters: [slugParam],
        requestBody: codeBody({ problemId: { type: "string" } }, ["problemId"]),
        responses: {
          201: { description: "Judged and scored submission" },
          400: { description: "Contest not running or invalid input" },
          403: { description: "Not registered" },
          404: { description: "Contest or problem not found" },
        },
      },
    },

    "/api/contests/{slug}/leaderboard": {
      get: {
        tags: ["Contests"],
        summary: "Contest leaderboard",
        security: [],
        parameters: [slugParam],
        responses: { 200: { description: "Standings ordered by rank" } },
      },
    },

    "/api/contests/{slug}/leaderboard/detailed": {
      get: {
        tags: ["Contests"],
        summary: "Leaderboard with per-problem status",
        security: [],
        parameters: [slugParam],
        responses: { 200: { description: "OK" } },
      },
    },

    "/api/contests/{slug}/my-dashboard": {
      get: {
        tags: ["Contests"],
        summary: "My standing, problem statuses and recent submissions",
        parameters: [slugParam],
        responses: { 200: { description: "OK" }, 403: { description: "Not registered" } },
      },
    },

    "/api/contests/{slug}/my-submissions": {
      get: {
        tags: ["Contests"],
        summary: "My submissions in this contest",
        parameters: [slugParam],
        responses: { 200: { description: "OK" } },
      },
    },

    "/api/contests/submissions/{id}": {
      get: {
        tags: ["Contests"],
        summary: "Contest submission detail (author or contest manager)",
        parameters: [idParam],
        responses: { 200: { description: "OK" }, 403: { description: "Not allowed" } },
      },
    },

    // ---------------------------------------------------
    // PROGRESS
    // ---------------------------------------------------
    "/api/progress/me": {
      get: {
        tags: ["Progress"],
        summary: "Solved counts per difficulty, streak and achievements",
        responses: { 200: { description: "OK" } },
      },
    },

    "/api/progress/activity": {
      get: {
        tags: ["Progress"],
        summary: "Daily activity over the last 365 days",
        responses: { 200: { description: "OK" } },
      },
    },

    "/api/progress/solved-problems": {
      get: {
        tags: ["Progress"],
        summary: "Solved problems, most recently solved first",
        parameters: [
          { name: "difficulty", in: "query", schema: { type: "string", enum: ["EASY", "MEDIUM", "HARD"] } },
        ],
        responses: { 200: { description: "OK" }, 400: { description: "Unknown difficulty" } },
      },
    },

    "/api/progress/attempted-problems": {
      get: {
        tags: ["Progress"],
        summary: "Attempted but unsolved problems, most recently attempted first",
        responses: { 200: { description: "OK" } },
      },
    },

    "/api/progress/leaderboard": {
      get: {
        tags: ["Progress"],
        summary: "Global leaderboard by problems solved",
        parameters: [{ name: "limit", in: "query", schema: { type: "integer", default: 100, maximum: 100 } }],
        responses: { 200: { description: "OK" } },
      },
    },

    "/api/progress/achievements": {
      get: {
        tags: ["Progress"],
        summary: "Achievement catalogue",
        responses: { 200: { description: "OK" } },
      },
    },

    // ---------------------------------------------------
    // HEALTH
    // ---------------------------------------------------
    "/health": {
      get: {
        tags: ["Health"],
        summary: "Service health check",
        security: [],
        responses: { 200: { description: "OK" } },
      },
    },
  },
};

const options: swaggerJSDoc.Options = {
  definition: swaggerDefinition,
  apis: [],
};

export default swaggerJSDoc(options);
