/**
 * Remote messaging boundary: the operations the pipeline needs from a chat service.
 */

export interface MessageRef {
  chatId: string;
  messageId: number;
}

export type ParseMode = "MarkdownV2";

export type MembershipStatus =
  | "creator"
  | "administrator"
  | "member"
  | "restricted"
  | "left"
  | "kicked";

export type FailureKind = "network" | "server" | "rejected" | "auth" | "malformed";

/** Outcome of one remote call; the provider's rate signal is data, not an error. */
export type TransportResult<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; afterMs: number; reason: string }
  | { kind: "failure"; failure: FailureKind; transient: boolean; reason: string };

export interface DocumentUpload {
  path: string;
  filename: string;
}

export interface TransportBackend {
  sendDocument(
    chatId: string,
    document: DocumentUpload,
    caption: string,
    parseMode: ParseMode,
  ): Promise<TransportResult<MessageRef>>;

  sendMessage(
    chatId: string,
    text: string,
    parseMode?: ParseMode,
  ): Promise<TransportResult<MessageRef>>;

  forwardMessage(chatId: string, source: MessageRef): Promise<TransportResult<MessageRef>>;

  deleteMessage(ref: MessageRef): Promise<TransportResult<void>>;

  /** Numeric id of the account the backend acts as. */
  getSelfId(): Promise<TransportResult<number>>;

  getMembershipStatus(chatId: string, userId: number): Promise<TransportResult<MembershipStatus>>;
}
