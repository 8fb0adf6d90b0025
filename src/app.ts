import express from "express";
import helmet from "helmet";
import cors from "cors";
import cookieParser from "cookie-parser";
import dotenv from "dotenv";
import swaggerUi from "swagger-ui-express";
import swaggerSpec from "./docs/swagger";
import routes from "./routes";
import errorMiddleware from "./middleware/error.middleware";
import { requestLogger } from "./middleware/requestLogger";
import { registerActivityTracker } from "./services/activity.service";

dotenv.config();

const app = express();

// 🔐 Security, CORS, and parsers
const allowedOrigins = (process.env.CORS_ORIGINS || "http://localhost:5173,http://localhost:3000").split(",");

app.use(helmet());
app.use(
  cors({
    origin: function (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error("Not allowed by CORS"));
      }
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  })
);

app.use(express.json({ limit: "1mb" }));
app.use(cookieParser());

// 🧠 Request Logger (logs all API hits)
app.use(requestLogger);

// 🧩 Routes
app.use("/", routes);
app.use(
  "/api/docs",
  swaggerUi.serve,
  swaggerUi.setup(swaggerSpec, {
    swaggerOptions: {
      withCredentials: true,
    },
  })
);

// 📅 Activity and achievements follow every judged practice submission
registerActivityTracker();

// ❌ Centralized Error Handling + Logging
app.use(errorMiddleware);

export default app;
