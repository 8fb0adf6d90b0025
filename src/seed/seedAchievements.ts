import "reflect-metadata";
import dotenv from "dotenv";
dotenv.config();

import { AppDataSource } from "../config/db";
import { Achievement, AchievementType } from "../entities/achievement.entity";
import { errorMessage } from "../utils/error.util";
import logger from "../utils/logger";

const achievementRepo = () => AppDataSource.getRepository(Achievement);

export const ACHIEVEMENT_CATALOGUE: Array<Pick<Achievement, "name" | "description" | "achievementType" | "icon">> = [
  { name: "First Blood", description: "Solve your first problem", achievementType: AchievementType.FIRST_SOLVE, icon: "🎯" },
  { name: "Problem Solver", description: "Solve 10 problems", achievementType: AchievementType.SOLVE_10, icon: "⭐" },
  { name: "Expert", description: "Solve 50 problems", achievementType: AchievementType.SOLVE_50, icon: "🏆" },
  { name: "Master", description: "Solve 100 problems", achievementType: AchievementType.SOLVE_100, icon: "👑" },
  { name: "Week Warrior", description: "Maintain a 7-day solving streak", achievementType: AchievementType.SOLVE_STREAK_7, icon: "🔥" },
  { name: "Monthly Champion", description: "Maintain a 30-day solving streak", achievementType: AchievementType.SOLVE_STREAK_30, icon: "💯" },
  { name: "Easy Peasy", description: "Solve all easy problems", achievementType: AchievementType.ALL_EASY, icon: "✅" },
  { name: "Competitor", description: "Participate in your first contest", achievementType: AchievementType.FIRST_CONTEST, icon: "🎪" },
];

/**
 * Inserts the catalogue entries that are missing; existing ones are left untouched.
 */
export const seedAchievements = async (): Promise<{ created: number; existing: number }> => {
  let created = 0;
  let existing = 0;

  for (const entry of ACHIEVEMENT_CATALOGUE) {
    const found = await achievementRepo().findOne({ where: { achievementType: entry.achievementType } });
    if (found) {
      existing++;
      logger.info(`⏭️  Achievement already exists: ${found.name}`);
      continue;
    }
    await achievementRepo().save(achievementRepo().create(entry));
    created++;
    logger.info(`✅ Created achievement: ${entry.name}`);
  }

  return { created, existing };
};

async function main() {
  try {
    await AppDataSource.initialize();
    const { created, existing } = await seedAchievements();
    logger.info(`🎯 Achievements seeded: ${created} created, ${existing} already present`);
    await AppDataSource.destroy();
    process.exit(0);
  } catch (err) {
    logger.error(`❌ Seed error: ${errorMessage(err)}`);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
