/**
 * A task record carries a schedule the engine cannot compute (unknown interval unit,
 * negative skip count). Aborts the cycle rather than being recorded against the task.
 */
export class ScheduleConfigError extends Error {
  override readonly name = "ScheduleConfigError";
}
