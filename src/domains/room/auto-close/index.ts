export { AutoCloseService, type IdleRoomScan } from "./auto-close.service.js";
export { AutoCloseJob, type DissolveIdleRoom } from "./auto-close.job.js";
