import { logger } from "../src/infra/logger.js";

// Keep test output readable; logger tests raise the level themselves
logger.configure({ level: "silent", verbose: false });
