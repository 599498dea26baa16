import { Command, InvalidArgumentError, Option } from "commander";
import { defaults } from "../config";
import { MEDIA_TYPES, MediaType } from "../app/downloader/interfaces";

/**
 * Параметры командной строки
 */
export interface ICliOptions {
  list: boolean;
  download: boolean;
  entityId?: number;
  mediaType: MediaType;
  /** 0 = без ограничений */
  limit: number;
  days?: number;
  contains?: string;
  downloadDir: string;
}

function parseInteger(_value: string): number {
  if (!/^-?\d+$/.test(_value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number(_value);
}

function parseNonNegativeInteger(_value: string): number {
  const value = parseInteger(_value);
  if (value < 0) {
    throw new InvalidArgumentError("Must be zero or a positive integer.");
  }
  return value;
}

/**
 * ID диалога: 0 не соответствует ни одному диалогу
 */
function parseEntityId(_value: string): number {
  const value = parseInteger(_value);
  if (value === 0) {
    throw new InvalidArgumentError("Must be a non-zero integer.");
  }
  return value;
}

export function createProgram(): Command {
  return new Command()
    .name("tg-bulk-downloader")
    .description("Telegram Bulk Downloader: download photos, documents, GIFs and links from your chats")
    .option("--list", "List available groups/channels", false)
    .option("--download", "Download media from a group/channel", false)
    .option("--entity-id <id>", "ID of the group/channel to download from", parseEntityId)
    .addOption(
      new Option("--media-type <type>", "Type of media to download")
        .choices(MEDIA_TYPES)
        .default("all")
    )
    .option(
      "--limit <count>",
      "Maximum number of messages to process (0 for unlimited)",
      parseNonNegativeInteger,
      defaults.messageLimit
    )
    .option("--days <days>", "Only download media from the last N days", parseNonNegativeInteger)
    .option("--contains <text>", "Only download media from messages containing this text")
    .option("--download-dir <dir>", "Directory to save downloaded files", defaults.downloadDir);
}

/**
 * Разбор аргументов (без имени программы) в типизированные параметры
 */
export function parseCliOptions(_args: string[], _program: Command = createProgram()): ICliOptions {
  _program.parse(_args, { from: "user" });
  const options = _program.opts();

  return {
    list: options.list === true,
    download: options.download === true,
    entityId: typeof options.entityId === "number" ? options.entityId : undefined,
    mediaType: MEDIA_TYPES.find((type) => type === options.mediaType) ?? "all",
    limit: typeof options.limit === "number" ? options.limit : defaults.messageLimit,
    days: typeof options.days === "number" ? options.days : undefined,
    contains: typeof options.contains === "string" && options.contains ? options.contains : undefined,
    downloadDir: typeof options.downloadDir === "string" ? options.downloadDir : defaults.downloadDir,
  };
}
