import type { RemovalReason } from "./models.js";
import type { Button } from "./sink.js";

// Participant-facing and thread-facing texts. Wording is product copy, not behavior.

export const REMOVAL_REASON_TEXT: Record<RemovalReason, string> = {
  no_video: "no video was sent in time",
  max_strikes: "too many late submissions",
  manager_reject: "the reviewer rejected the video",
  review_deadline: "the video was not reviewed in time",
  reshoot_expired: "the requested reshoot was not sent in time",
  appeal_declined: "the appeal was declined",
  appeal_expired: "the appeal was not reviewed in time",
};

export const participantText = {
  processing: "Video received, checking it now.",
  retryLater: "The video could not be checked right now. Please send it again in a minute.",
  noActiveCourse: "You have no active course.",
  courseFinished: "Your course is already finished.",
  alreadySubmitted: "Today's video is already in. See you tomorrow.",
  windowClosed: "Today's window has closed.",
  sendNow: "The window is open. Send your video now.",
  videoOnly: "Please send a video.",
  tooEarly: (opensAt: string) => `Too early. The window opens at ${opensAt}.`,
  notStarted: (startDate: string) => `Your course starts on ${startDate}.`,
  approved: (day: number, total: number) => `Day ${day}/${total} accepted.`,
  approvedLate: (day: number, total: number, strikes: number, max: number) =>
    `Day ${day}/${total} accepted, but it was late. Strike ${strikes}/${max}.`,
  completed: (total: number) => `All ${total} days done. The course is complete.`,
  pendingReview: "The video went to your reviewer for a manual check.",
  reshootRequested: (deadline: string) => `Your reviewer asked for a new video. Send it before ${deadline}.`,
  reshootPending: (deadline: string) => `A new video is still expected before ${deadline}.`,
  removed: (reason: RemovalReason) => `You have been removed from the course: ${REMOVAL_REASON_TEXT[reason]}.`,
  appealOffer: (deadline: string) => `You can appeal until ${deadline}.`,
  appealButtonExpired: "The time to appeal has passed.",
  appealAskMedia: "Send a video that supports your appeal.",
  appealAskText: "Now describe in one message why the removal should be reversed.",
  appealSubmitted: "Your appeal was sent to the reviewer.",
  appealAccepted: "Your appeal was accepted. The course continues.",
  strikeWarning: (strikes: number, max: number) => `No video yet today. Strike ${strikes}/${max}.`,
  reminder: (minutes: number) => `Reminder: your video is due in ${minutes} minutes.`,
  extended: (total: number) => `Your course was extended to ${total} days.`,
  completedEarly: "Your reviewer ended the course. Well done.",
};

export const threadText = {
  registrationCard: (name: string, scheduledTime: string, startDate: string, totalDays: number) =>
    `Registration\nParticipant: ${name}\nTime: ${scheduledTime}\nStart: ${startDate}\nLength: ${totalDays} days`,
  submission: (day: number, total: number, delay: number, confidence: number) =>
    `Day ${day}/${total}, delay ${delay} min, confidence ${confidence.toFixed(2)}.`,
  reviewNeeded: (day: number, total: number, reason: string, deadline: string) =>
    `Day ${day}/${total} needs review (${reason}). Decide before ${deadline}.`,
  confirmed: (day: number) => `Day ${day} confirmed by the reviewer.`,
  reshootRequested: (day: number, deadline: string) => `Reshoot of day ${day} requested, due ${deadline}.`,
  lateStrike: (strikes: number, max: number) => `Late submission. Strike ${strikes}/${max}.`,
  missedStrike: (strikes: number, max: number) => `No video 30 minutes after the scheduled time. Strike ${strikes}/${max}.`,
  closed: (reason: string) => `Closed: ${reason}.`,
  completed: (total: number) => `Completed all ${total} days.`,
  completedEarly: (day: number, total: number) => `Completed early by the reviewer at day ${day}/${total}.`,
  extended: (from: number, to: number) => `Extended from ${from} to ${to} days.`,
  appealEvidence: (text: string, deadline: string) => `Appeal:\n${text}\nDecide before ${deadline}.`,
  appealAccepted: (appealCount: number) => `Appeal accepted (${appealCount} so far).`,
};

export const generalText = {
  removed: (name: string, reason: RemovalReason) => `${name} removed: ${REMOVAL_REASON_TEXT[reason]}.`,
  reviewNeeded: (name: string, day: number) => `${name}, day ${day}: video waiting for review.`,
  appealSubmitted: (name: string) => `${name} submitted an appeal.`,
};

export const threadTitle = (name: string, currentDay: number, totalDays: number, marker?: string): string =>
  marker ? `${name} ${currentDay}/${totalDays} ${marker}` : `${name} ${currentDay}/${totalDays}`;

export const reviewButtons = (logId: number): Button[] => [
  { label: "Confirm", action: "confirm", target: logId },
  { label: "Reject", action: "reject", target: logId },
  { label: "Reshoot", action: "reshoot", target: logId },
];

export const appealReviewButtons = (courseId: number): Button[] => [
  { label: "Accept appeal", action: "appeal_accept", target: courseId },
  { label: "Decline appeal", action: "appeal_decline", target: courseId },
];

export const appealButton = (courseId: number): Button[] => [{ label: "Appeal", action: "appeal_start", target: courseId }];

export const cardButtons = (courseId: number, canExtend: boolean, extensionDays: number): Button[] => [
  ...(canExtend ? [{ label: `Extend +${extensionDays} days`, action: "extend" as const, target: courseId }] : []),
  { label: "Complete course", action: "complete", target: courseId },
];
