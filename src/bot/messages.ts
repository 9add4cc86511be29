import { LEARNING_INTERVALS } from "../learning/intervals";

export const REGISTER_FIRST =
  "You need to register first. Use /register [timezone] to create an account.";

export const UNSUPPORTED_FILE =
  "Sorry, this file type is not supported. Please upload a PDF, EPUB, or TXT file.";

export const PROCESSING_FAILED =
  "There was an error processing your book. Please try again or try a different file.";

export const TEXT_HINT =
  "I'm designed to work with commands and book files. Try /help to see what I can do!";

export function startMessage(name: string): string {
  return `Hi ${name}! I'm your Book Retention Bot. I'll help you process, analyze, and create spaced repetition learning schedules for books.

Use /register [timezone] to set up your account with your timezone preference.
For example: /register UTC or /register America/New_York

Type /help to see all available commands.`;
}

export function unknownCommand(command: string): string {
  return `Unknown command: /${command}. Type /help to see all available commands.`;
}

const intervalLines = LEARNING_INTERVALS.map(
  (i) => `/${i.command} [book_id] - ${i.label} (Day ${i.dayOffset})`
).join("\n");

export const HELP_TEXT = `*Book Retention Bot Commands*

*User Management*
/start - Get started with the bot
/register [timezone] - Create user account with timezone preference
/preferences - Show your preferences
/preferences time [HH:MM] - Set the notification time
/preferences notifications [on|off] - Turn notifications on or off

*Book Management*
/add [title] [author] - Manually add a book
/mybooks - View books in progress/completed
Send a PDF, EPUB or TXT file to upload a book.

*Book Analysis*
/chapters [book_id] - List the chapters of a book
/summary [book_id] - Receive AI-generated book overview
/concepts [book_id] - Get key takeaways as bullet points
/estimate [book_id] - Show reading and learning time estimates

*Spaced Repetition*
${intervalLines}`;
