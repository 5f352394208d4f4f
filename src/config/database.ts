import mongoose from 'mongoose';
import config from './index';
import { logger } from '../utils/logger';

export const connectDB = async (): Promise<typeof mongoose> => {
  try {
    const connection = await mongoose.connect(config.mongo.uri, {
      dbName: config.mongo.dbName,
    });
    logger.info({ dbName: config.mongo.dbName }, 'MongoDB connected');
    return connection;
  } catch (error) {
    logger.error({
      error: error instanceof Error ? error.message : 'Unknown error',
    }, 'MongoDB connection error');
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  logger.info('MongoDB disconnected');
};
