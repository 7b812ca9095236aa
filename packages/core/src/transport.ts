/**
 * Chat Transport Contract
 *
 * The only operations the pipeline needs from a chat platform.
 */

export interface ChoiceButton {
  text: string;
  payload: string;
}

/** Rows of buttons, rendered top to bottom */
export type ButtonGrid = ChoiceButton[][];

export interface SendTextOptions {
  buttons?: ButtonGrid;
  markdown?: boolean;
}

export type SentFileKind = 'audio' | 'video' | 'document';

export interface ChatTransport {
  /** Returns the id of the new message */
  sendText(chatId: number, text: string, options?: SendTextOptions): Promise<number>;
  /** Returns false when the edit did not go through */
  editText(chatId: number, messageId: number, text: string, options?: { markdown?: boolean }): Promise<boolean>;
  editButtons(chatId: number, messageId: number, buttons: ButtonGrid): Promise<boolean>;
  sendFile(chatId: number, filePath: string, kind: SentFileKind, caption?: string): Promise<boolean>;
}
