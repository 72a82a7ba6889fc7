import { config } from 'dotenv';
import { join } from 'path';
import { homedir } from 'os';

// Load .env file from current directory or home directory.
// Must be imported before anything that creates a logger.
config({ path: ['.env', join(homedir(), '.healbox', '.env')] });
