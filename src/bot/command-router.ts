import type { UploadProcessor } from "../core/types";
import { DrizzleDB } from "../db/client";
import type { Book, User } from "../db/schema";
import {
  createUser,
  getUser,
  isValidTimezone,
  updateUserActivity,
  updateUserPreferences,
  DEFAULT_TIMEZONE,
} from "../api/users";
import {
  createBook,
  getBook,
  getBookChapters,
  getBookSynthesis,
  getChapterAnalyses,
  getLearningMaterial,
  getUserBooks,
} from "../api/books";
import {
  LEARNING_INTERVALS,
  type LearningInterval,
} from "../learning/intervals";
import { isSupportedBookFile } from "../parsers/text-extractor";
import { categorizeError, UserInputError } from "./errors";
import {
  HELP_TEXT,
  PROCESSING_FAILED,
  REGISTER_FIRST,
  TEXT_HINT,
  UNSUPPORTED_FILE,
  startMessage,
  unknownCommand,
} from "./messages";

export interface ChatUser {
  id: string;
  username?: string;
  firstName?: string;
  lastName?: string;
}

export interface IncomingDocument {
  fileName: string;
  content: Buffer;
}

export interface IncomingMessage {
  user: ChatUser;
  text?: string;
  document?: IncomingDocument;
}

export interface Reply {
  text: string;
}

interface CommandContext {
  message: IncomingMessage;
  args: string[];
}

type Command =
  | {
      requiresUser: false;
      run: (ctx: CommandContext) => Reply[] | Promise<Reply[]>;
    }
  | {
      requiresUser: true;
      run: (ctx: CommandContext & { user: User }) => Reply[] | Promise<Reply[]>;
    };

const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

function reply(text: string): Reply[] {
  return [{ text }];
}

export function formatDuration(minutes: number): string {
  if (minutes < 60) return `${minutes} min`;
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest > 0 ? `${hours} h ${rest} min` : `${hours} h`;
}

function formatBookLine(book: Book): string {
  return `${book.title}${book.author ? ` by ${book.author}` : ""}`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Parse "/name@bot arg1 arg2" into its lowercase name and arguments.
 */
export function parseCommand(text: string): { name: string; args: string[] } {
  const [head, ...args] = text.trim().split(/\s+/);
  const name = head.slice(1).split("@")[0].toLowerCase();
  return { name, args };
}

/**
 * Transport-agnostic chat front end: takes one incoming message and returns
 * the replies to send back. Any thrown error becomes a single reply with a
 * user-facing message.
 */
export class CommandRouter {
  private commands = new Map<string, Command>();

  constructor(
    private db: DrizzleDB,
    private processor: UploadProcessor
  ) {
    this.commands.set("start", {
      requiresUser: false,
      run: ({ message }) => this.start(message.user),
    });
    this.commands.set("help", {
      requiresUser: false,
      run: () => reply(HELP_TEXT),
    });
    this.commands.set("register", {
      requiresUser: false,
      run: ({ message, args }) => this.register(message.user, args),
    });
    this.commands.set("preferences", {
      requiresUser: true,
      run: ({ user, args }) => this.preferences(user, args),
    });
    this.commands.set("add", {
      requiresUser: true,
      run: ({ user, args }) => this.addBook(user, args),
    });
    this.commands.set("mybooks", {
      requiresUser: true,
      run: ({ user }) => this.myBooks(user),
    });
    this.commands.set("chapters", {
      requiresUser: true,
      run: ({ user, args }) => this.chapters(this.requireBook(user, args, "chapters")),
    });
    this.commands.set("summary", {
      requiresUser: true,
      run: ({ user, args }) => this.summary(this.requireBook(user, args, "summary")),
    });
    this.commands.set("concepts", {
      requiresUser: true,
      run: ({ user, args }) => this.concepts(this.requireBook(user, args, "concepts")),
    });
    this.commands.set("estimate", {
      requiresUser: true,
      run: ({ user, args }) => this.estimate(this.requireBook(user, args, "estimate")),
    });

    for (const interval of LEARNING_INTERVALS) {
      this.commands.set(interval.command, {
        requiresUser: true,
        run: ({ user, args }) =>
          this.learningMaterial(
            interval,
            this.requireBook(user, args, interval.command)
          ),
      });
    }
  }

  /** Names of every registered command */
  get commandNames(): string[] {
    return [...this.commands.keys()];
  }

  async handle(message: IncomingMessage): Promise<Reply[]> {
    try {
      if (message.document) {
        return await this.handleDocument(message.user, message.document);
      }

      const text = message.text?.trim() ?? "";
      if (text.startsWith("/")) {
        return await this.handleCommand(message, text);
      }

      return this.handleText(message.user);
    } catch (error) {
      const { category, userMessage, message: detail } = categorizeError(error);
      if (category !== "user") {
        console.error(`Error handling message from ${message.user.id} (${category}): ${detail}`);
      }
      return reply(userMessage);
    }
  }

  private async handleCommand(
    message: IncomingMessage,
    text: string
  ): Promise<Reply[]> {
    const { name, args } = parseCommand(text);
    const command = this.commands.get(name);

    if (!command) {
      return reply(unknownCommand(name));
    }

    if (!command.requiresUser) {
      return command.run({ message, args });
    }

    const user = this.activeUser(message.user);
    if (!user) {
      return reply(REGISTER_FIRST);
    }

    return command.run({ message, args, user });
  }

  private async handleDocument(
    chatUser: ChatUser,
    document: IncomingDocument
  ): Promise<Reply[]> {
    const user = this.activeUser(chatUser);
    if (!user) {
      return reply(REGISTER_FIRST);
    }

    if (!isSupportedBookFile(document.fileName)) {
      return reply(UNSUPPORTED_FILE);
    }

    const replies: Reply[] = [
      {
        text: `I've received your book: ${document.fileName}
I'll start processing it now. This may take a few minutes depending on the size.
I'll notify you when it's ready.`,
      },
    ];

    const result = await this.processor.processUpload({
      userId: user.id,
      userKey: chatUser.id,
      fileName: document.fileName,
      content: document.content,
    });

    if (!result) {
      replies.push({ text: PROCESSING_FAILED });
      return replies;
    }

    replies.push({
      text: `Your book has been processed successfully!
Title: ${result.title}
Chapters: ${result.chapterCount}
Book ID: ${result.bookId}

You can now use commands like /summary ${result.bookId} or /recap ${result.bookId} to work with this book.`,
    });
    return replies;
  }

  private handleText(chatUser: ChatUser): Reply[] {
    if (!this.activeUser(chatUser)) {
      return reply(REGISTER_FIRST);
    }
    return reply(TEXT_HINT);
  }

  /**
   * Look up the sender and touch their last-active time.
   */
  private activeUser(chatUser: ChatUser): User | null {
    return updateUserActivity(this.db, chatUser.id);
  }

  private requireBook(user: User, args: string[], command: string): Book {
    const raw = args[0];
    const bookId = raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : NaN;

    if (Number.isNaN(bookId)) {
      throw new UserInputError(
        `Please provide a book ID. Usage: /${command} [book_id]`
      );
    }

    const book = getBook(this.db, bookId, user.id);
    if (!book) {
      throw new UserInputError(
        `Book ${bookId} not found. Use /mybooks to see your books.`
      );
    }
    return book;
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  private start(chatUser: ChatUser): Reply[] {
    const name = chatUser.firstName ?? chatUser.username ?? "there";
    return reply(startMessage(name));
  }

  private register(chatUser: ChatUser, args: string[]): Reply[] {
    const replies: Reply[] = [];
    let timezone = DEFAULT_TIMEZONE;

    const requested = args[0];
    if (requested !== undefined) {
      if (isValidTimezone(requested)) {
        timezone = requested;
      } else {
        replies.push({
          text: `Invalid timezone: ${requested}. Using UTC instead.
Please see https://en.wikipedia.org/wiki/List_of_tz_database_time_zones for valid timezones.`,
        });
      }
    }

    if (getUser(this.db, chatUser.id)) {
      updateUserPreferences(this.db, chatUser.id, { timezone });
      replies.push({
        text: `Your account has been updated with timezone: ${timezone}`,
      });
      return replies;
    }

    createUser(this.db, {
      chatUserId: chatUser.id,
      username: chatUser.username,
      firstName: chatUser.firstName,
      lastName: chatUser.lastName,
      timezone,
    });
    replies.push({
      text: `Welcome! Your account has been created with timezone: ${timezone}

You can now use the bot to manage your books and learning schedules.
Try uploading a book file or adding one manually with /add [title] [author]`,
    });
    return replies;
  }

  private preferences(user: User, args: string[]): Reply[] {
    const [setting, value] = args;

    if (setting === undefined) {
      return reply(`Your current preferences:
${this.formatPreferences(user)}

To change your timezone, use /register [timezone]`);
    }

    let updated: User | null;

    if (setting === "time") {
      if (value === undefined || !TIME_PATTERN.test(value)) {
        throw new UserInputError(
          `Invalid time: ${value ?? ""}. Use HH:MM, for example 09:00.`
        );
      }
      updated = updateUserPreferences(this.db, user.chatUserId, {
        notificationTime: value,
      });
    } else if (setting === "notifications" && (value === "on" || value === "off")) {
      updated = updateUserPreferences(this.db, user.chatUserId, {
        notificationEnabled: value === "on",
      });
    } else {
      throw new UserInputError(
        "Usage: /preferences time [HH:MM] or /preferences notifications [on|off]"
      );
    }

    return reply(`Preferences updated.
${this.formatPreferences(updated ?? user)}`);
  }

  private formatPreferences(user: User): string {
    return `- Timezone: ${user.timezone}
- Notification time: ${user.notificationTime}
- Notifications enabled: ${user.notificationEnabled ? "Yes" : "No"}`;
  }

  private addBook(user: User, args: string[]): Reply[] {
    const [title, ...rest] = args;

    if (title === undefined) {
      throw new UserInputError(
        "Please provide a book title. Usage: /add [title] [author]"
      );
    }

    const author = rest.length > 0 ? rest.join(" ") : undefined;
    const book = createBook(this.db, user.id, title, author);

    return reply(`Book added: ${formatBookLine(book)}
Book ID: ${book.id}

Since this book was added manually, you'll need to upload content or add notes later.`);
  }

  private myBooks(user: User): Reply[] {
    const books = getUserBooks(this.db, user.id);

    if (books.length === 0) {
      return reply(
        "You don't have any books yet. Use /add [title] [author] to add a book manually, or upload a book file."
      );
    }

    const lines = books.map(
      (book) => `ID: ${book.id} - ${formatBookLine(book)}
Status: ${capitalize(book.processingStatus)}
Chapters: ${book.processedChapters}/${book.totalChapters}`
    );

    return reply(`Your books:\n\n${lines.join("\n\n")}`);
  }

  private chapters(book: Book): Reply[] {
    const chapters = getBookChapters(this.db, book.id);

    if (chapters.length === 0) {
      return reply(`No chapters found for '${book.title}'.`);
    }

    const lines = chapters.map(
      (c) => `${c.chapterNumber}. ${c.title} (${formatDuration(c.estimatedReadingTime)})`
    );
    return reply(`Chapters of '${book.title}':\n\n${lines.join("\n")}`);
  }

  private summary(book: Book): Reply[] {
    const synthesis = getBookSynthesis(this.db, book.id);

    if (!synthesis) {
      return reply(this.notReady(book, "summary"));
    }

    return reply(`*${formatBookLine(book)}*

${synthesis.summaryShort}

${synthesis.summaryDetailed}`);
  }

  private concepts(book: Book): Reply[] {
    const synthesis = getBookSynthesis(this.db, book.id);

    if (synthesis) {
      const themes = synthesis.keyThemes.map((t) => `• ${t}`).join("\n");
      const concepts = synthesis.conceptHierarchy
        .map((node) =>
          [`• ${node.concept}`, ...node.subconcepts.map((s) => `  - ${s}`)].join("\n")
        )
        .join("\n");

      return reply(`Key takeaways from '${book.title}':

Themes:
${themes}

Concepts:
${concepts}`);
    }

    // Chapters can be analysed before the synthesis exists
    const analyses = getChapterAnalyses(this.db, book.id);
    if (analyses.length === 0) {
      return reply(this.notReady(book, "key concepts"));
    }

    const lines = analyses.flatMap((a) => a.keyConcepts.map((c) => `• ${c}`));
    return reply(`Key takeaways from '${book.title}':\n\n${lines.join("\n")}`);
  }

  private estimate(book: Book): Reply[] {
    const chapters = getBookChapters(this.db, book.id);
    const readingTime =
      book.readingTimeMinutes ??
      (chapters.length > 0
        ? chapters.reduce((sum, c) => sum + c.estimatedReadingTime, 0)
        : null);

    if (readingTime === null) {
      return reply(
        `No estimates yet for '${book.title}'. Upload the book file so I can measure it.`
      );
    }

    const days = LEARNING_INTERVALS.map((i) => i.dayOffset);
    const schedule = `${days.slice(0, -1).join(", ")} and ${days[days.length - 1]}`;

    const lines = [
      `Estimates for '${book.title}':`,
      `- Reading time: ${formatDuration(readingTime)}`,
      ...(book.wordCount !== null
        ? [`- Words: ${book.wordCount.toLocaleString("en-US")}`]
        : []),
      `- Chapters: ${chapters.length}`,
      `- Learning schedule: ${LEARNING_INTERVALS.length} review sessions on days ${schedule}`,
    ];

    return reply(lines.join("\n"));
  }

  private learningMaterial(interval: LearningInterval, book: Book): Reply[] {
    const material = getLearningMaterial(this.db, book.id, interval.type);

    if (!material) {
      return reply(this.notReady(book, interval.label.toLowerCase()));
    }

    const { headline, keyPoints, questions } = material.content;
    const points = keyPoints.map((p) => `• ${p}`).join("\n");
    const qa = questions
      .map((q, i) => `${i + 1}. ${q.question}\n   Answer: ${q.answer}`)
      .join("\n");

    return reply(`*${headline}*
Day ${interval.dayOffset} - ${interval.label}

Key points:
${points}

Questions:
${qa}`);
  }

  private notReady(book: Book, what: string): string {
    if (book.processingStatus === "processing") {
      return `'${book.title}' is still being processed. Please check back in a few minutes.`;
    }
    return `No ${what} available yet for '${book.title}'.`;
  }
}
