export { PollLoop, type PollLoopConfig } from "./poll-loop.js";
