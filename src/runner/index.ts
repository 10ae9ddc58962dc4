export { Semaphore } from './semaphore';
export { LogChannel, consume_logs } from './log_channel';
export { LogManager, Logger } from './logger';
export { open_result_sink } from './result_store';
export { run_all, type RunOptions } from './orchestrator';
