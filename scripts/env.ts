/**
 * Loads .env.local then .env from the project root before config is read
 */
import dotenv from 'dotenv';
import path from 'path';

const projectRoot = path.resolve(__dirname, '..');

dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });
