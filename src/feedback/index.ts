export {
  FeedbackRecorder,
  type FeedbackInput,
  type FeedbackRecord,
} from "./recorder.js";
