export { type Clock, SystemClock, ManualClock } from "./clock.js";
