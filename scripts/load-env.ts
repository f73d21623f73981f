/**
 * Load .env.local first, then .env, from the working directory.
 * dotenv never overrides a variable that is already set, so the first file wins.
 */

import dotenv from 'dotenv';
import path from 'path';

const projectRoot = process.cwd();

dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });
