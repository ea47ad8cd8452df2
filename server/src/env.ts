// Load environment variables FIRST, before any other imports
// This file must be imported at the very top of entry points
import dotenv from 'dotenv';
import path from 'path';

// .env holds local overrides, .env.defaults the committed defaults.
// dotenv never overrides a variable that is already set, so the first file wins.
dotenv.config({ path: path.join(__dirname, '../../.env') });
dotenv.config({ path: path.join(__dirname, '../../.env.defaults') });
