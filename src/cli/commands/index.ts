export { createFinalizeCommand } from "./finalize.js";
export { createPublishCommand } from "./publish.js";
export { createStatusCommand } from "./status.js";
