export {
  AbortedError,
  abortReason,
  delay,
  isAbortError,
  linkedAbortController,
  rejectOnAbort,
  throwIfAborted,
} from "./abort";
