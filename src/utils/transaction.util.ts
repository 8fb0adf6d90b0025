import { EntityManager } from "typeorm";
import { AppDataSource } from "../config/db";
import { errorMessage } from "./error.util";
import logger from "./logger";

/**
 * Runs `work` inside one database transaction: commit on success, rollback and
 * rethrow on failure, always release the runner.
 */
export const withTransaction = async <T>(label: string, work: (manager: EntityManager) => Promise<T>): Promise<T> => {
    const queryRunner = AppDataSource.createQueryRunner();

    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
        const result = await work(queryRunner.manager);
        await queryRunner.commitTransaction();
        return result;
    } catch (error) {
        await queryRunner.rollbackTransaction();
        logger.error(`❌ [${label}] Transaction rolled back: ${errorMessage(error)}`);
        throw error;
    } finally {
        await queryRunner.release();
    }
};
