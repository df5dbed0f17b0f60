export { runDaemon } from "./start.js";
export { toggleCenter } from "./toggle-center.js";
export { sendNotification, parseUrgency, parseActionOption, parseInteger } from "./send.js";
export { showInfo } from "./info.js";
export { showStatus } from "./status.js";
export { toggleDoNotDisturb } from "./dnd.js";
export { clearCenter } from "./clear.js";
