import * as fs from "fs";
import bigInt from "big-integer";
import { Api, utils } from "telegram";
import type { Entity, EntityLike } from "telegram/define";
import type { Dialog } from "telegram/tl/custom/dialog";
import {
  IChatMessage,
  IConversation,
  IFetchMessagesOptions,
  IMessagingGateway,
  MessageMedia,
} from "../../app/downloader/interfaces";
import { classifyDialog } from "../../app/downloader/parts/dialogHelpers";
import { Logger } from "../../shared/utils/logger";

/**
 * Методы TelegramClient, которые нужны шлюзу
 */
export interface IGatewayClient {
  getDialogs(): Promise<Dialog[]>;
  getEntity(_entity: EntityLike): Promise<Entity>;
  iterMessages(
    _entity: EntityLike | undefined,
    _params: { limit?: number; filter?: Api.TypeMessagesFilter }
  ): AsyncIterable<unknown>;
  downloadMedia(_message: Api.Message): Promise<string | Buffer | undefined>;
}

/**
 * Шлюз к Telegram поверх GramJS
 * Переводит диалоги и сообщения библиотеки в простые структуры загрузчика
 */
export class TelegramGateway implements IMessagingGateway {
  private readonly p_client: IGatewayClient;
  private readonly p_entities = new Map<number, Entity>();
  private readonly p_rawMessages = new Map<number, Api.Message>();
  private p_dialogsLoaded = false;

  constructor(_client: IGatewayClient) {
    this.p_client = _client;
  }

  async getDialogsAsync(): Promise<IConversation[]> {
    const dialogs = await this.p_client.getDialogs();
    this.p_dialogsLoaded = true;

    const conversations: IConversation[] = [];
    for (const dialog of dialogs) {
      if (!dialog.id) continue;

      conversations.push({
        id: dialog.id.toJSNumber(),
        name: dialog.name ?? dialog.title ?? "",
        type: classifyDialog({ isGroup: dialog.isGroup, isChannel: dialog.isChannel }),
      });
    }

    return conversations;
  }

  async resolveConversationAsync(_conversationId: number): Promise<IConversation> {
    const entity = await this.p_getEntityAsync(_conversationId);

    return {
      id: _conversationId,
      name: utils.getDisplayName(entity),
      type: classifyEntity(entity),
    };
  }

  async fetchMessagesAsync(
    _conversationId: number,
    _options: IFetchMessagesOptions
  ): Promise<IChatMessage[]> {
    const entity = await this.p_getEntityAsync(_conversationId);
    const messages: IChatMessage[] = [];
    this.p_rawMessages.clear();

    for await (const item of this.p_client.iterMessages(entity, {
      limit: _options.limit,
      filter: toInputFilter(_options.filter),
    })) {
      // Служебные сообщения (вход в группу, закрепление) пропускаем
      if (!(item instanceof Api.Message)) continue;

      const message = toChatMessage(item);
      // Сообщения идут от новых к старым, дальше будут только более старые
      if (_options.minDate && message.date < _options.minDate) break;

      this.p_rawMessages.set(message.id, item);
      messages.push(message);
    }

    return messages;
  }

  async downloadMediaAsync(_message: IChatMessage, _filePath: string): Promise<boolean> {
    const raw = this.p_rawMessages.get(_message.id);
    if (!raw) {
      throw new Error(`Message ${_message.id} was not fetched in this session`);
    }

    const data = await this.p_client.downloadMedia(raw);
    if (!data || typeof data === "string") {
      return false;
    }

    // Итоговое имя появляется только после полной записи
    const partPath = `${_filePath}.part`;
    try {
      await fs.promises.writeFile(partPath, data);
      await fs.promises.rename(partPath, _filePath);
    } catch (error) {
      await fs.promises.rm(partPath, { force: true });
      throw error;
    }
    return true;
  }

  /**
   * Поиск сущности по ID
   * Если ее нет в кэше библиотеки, один раз загружаем список диалогов и пробуем снова
   */
  private async p_getEntityAsync(_id: number): Promise<Entity> {
    const cached = this.p_entities.get(_id);
    if (cached) return cached;

    let entity: Entity;
    try {
      entity = await this.p_client.getEntity(bigInt(_id));
    } catch (error) {
      if (this.p_dialogsLoaded) throw error;

      Logger.info(`Conversation ${_id} is not cached yet, loading dialogs...`);
      await this.p_client.getDialogs();
      this.p_dialogsLoaded = true;
      entity = await this.p_client.getEntity(bigInt(_id));
    }

    this.p_entities.set(_id, entity);
    return entity;
  }
}

/**
 * Тип диалога по сущности: обычный чат и супергруппа считаются группами
 */
export function classifyEntity(_entity: Entity): IConversation["type"] {
  const isChannel = _entity instanceof Api.Channel;
  const isGroup = _entity instanceof Api.Chat || (_entity instanceof Api.Channel && !!_entity.megagroup);
  return classifyDialog({ isGroup, isChannel });
}

/**
 * Фильтр сообщений на стороне сервера
 */
export function toInputFilter(
  _filter: IFetchMessagesOptions["filter"]
): Api.TypeMessagesFilter | undefined {
  switch (_filter) {
    case "photos":
      return new Api.InputMessagesFilterPhotos();
    case "documents":
      return new Api.InputMessagesFilterDocument();
    case "gifs":
      return new Api.InputMessagesFilterGif();
    default:
      return undefined;
  }
}

export function toChatMessage(_message: Api.Message): IChatMessage {
  return {
    id: _message.id,
    text: _message.message || undefined,
    date: new Date(_message.date * 1000),
    media: toMessageMedia(_message.media),
  };
}

export function toMessageMedia(_media: Api.TypeMessageMedia | undefined): MessageMedia | null {
  if (_media instanceof Api.MessageMediaPhoto) {
    return { kind: "photo" };
  }

  if (_media instanceof Api.MessageMediaDocument) {
    const document = _media.document;
    if (!(document instanceof Api.Document)) {
      return { kind: "document", isGif: false };
    }

    let fileName: string | undefined;
    let isGif = false;
    for (const attribute of document.attributes) {
      if (attribute instanceof Api.DocumentAttributeFilename) {
        fileName = attribute.fileName;
      } else if (attribute instanceof Api.DocumentAttributeAnimated) {
        isGif = true;
      }
    }

    return { kind: "document", fileName, mimeType: document.mimeType, isGif };
  }

  if (_media instanceof Api.MessageMediaWebPage) {
    const webpage = _media.webpage;
    return { kind: "webpage", url: webpage instanceof Api.WebPage ? webpage.url : undefined };
  }

  return null;
}
