import type { Notifier } from "./delivery.js";
import { threadTitle } from "./messages.js";
import type { Course, Participant } from "./models.js";

export type ClosureOutcome = "completed" | "refused";

export type ClosureReport = {
  renamed: boolean;
  buttonsStripped: boolean;
  noticePosted: boolean;
  closed: boolean;
};

const MARKERS: Record<ClosureOutcome, string> = {
  completed: "[done]",
  refused: "[removed]",
};

/**
 * Wraps up the collaboration thread after a course ends. Each step runs on its own;
 * a failed step is logged by the notifier and the next one still runs. Running the
 * sequence twice is harmless since "already closed" counts as success.
 */
export const runClosureSequence = async (
  notifier: Notifier,
  participant: Participant,
  course: Course,
  outcome: ClosureOutcome,
  notice: string,
): Promise<ClosureReport> => {
  const renamed = await notifier.renameThread(
    participant,
    threadTitle(participant.name, course.current_day, course.total_days, MARKERS[outcome]),
  );
  const buttonsStripped = await notifier.setButtons(course.registration_message, []);
  const noticePosted = (await notifier.toThread(participant, notice)) !== null;
  const closed = await notifier.closeThread(participant);
  return { renamed, buttonsStripped, noticePosted, closed };
};
