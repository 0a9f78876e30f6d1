import * as dotenv from "dotenv";

// Load environment variables from .env before any settings are read
dotenv.config();
