import { Server } from "socket.io";
import http from "http";
import logger from "./logger";

let io: Server | undefined;

const ALLOWED_ORIGINS = (process.env.CORS_ORIGINS || "http://localhost:5173,http://localhost:3000").split(",");

export const contestRoom = (contestId: string) => `contest_${contestId}`;

export const initSocket = (server: http.Server): Server => {
  io = new Server(server, {
    cors: {
      origin: ALLOWED_ORIGINS,
      credentials: true,
    },
    transports: ["websocket", "polling"],
  });

  io.on("connection", (socket) => {
    logger.info(`⚡ [Socket] Connected: ${socket.id}`);

    // Spectators and participants follow one contest's leaderboard
    socket.on("join_contest_room", (contestId: string) => {
      socket.join(contestRoom(contestId));
      logger.info(`🏆 [Socket] ${socket.id} joined ${contestRoom(contestId)}`);
    });

    socket.on("leave_contest_room", (contestId: string) => {
      socket.leave(contestRoom(contestId));
    });

    socket.on("disconnect", () => {
      logger.info(`❌ [Socket] Disconnected: ${socket.id}`);
    });
  });

  return io;
};

export interface LeaderboardUpdatePayload {
  contestId: string;
  standings: Array<{ participantId: string; userId: string; rank: number; totalScore: number; totalTime: number }>;
}

/**
 * Broadcast fresh standings. Without an attached server (scripts, tests) this is a no-op.
 */
export const emitLeaderboardUpdate = (payload: LeaderboardUpdatePayload): void => {
  if (!io) return;
  io.to(contestRoom(payload.contestId)).emit("leaderboard_updated", payload);
};
