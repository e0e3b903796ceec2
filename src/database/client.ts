import { config } from '@config/app.config.js';
import { createDatabase } from './connection.js';

const connection = await createDatabase(config.database.dataDir);

export const db = connection.db;
export const client = connection.client;
