import { asList } from "../connectors/helpers/asList";
import {
  AUTH_SUCCESS_CODE,
  RESPONSE_CODES,
} from "../constants/OperationConstant";
import type {
  DecodedMap,
  DecodedValue,
  ResponseFailure,
} from "../types/remittance.types";
import { isDecodedMap } from "../utils/valueGuards";

// Fields a vendor message entry may carry its text in, by preference
const MESSAGE_TEXT_FIELDS = ["MessageText", "Message", "Description", "Text"];

const textOf = (value: DecodedValue | undefined): string =>
  typeof value === "string" ? value.trim() : "";

/**
 * Maps vendor response codes to readable text and extracts failures from
 * decoded responses
 */
export class ResponseNormalizer {
  private readonly codes: Readonly<Record<string, string>>;

  constructor(extraCodes: Readonly<Record<string, string>> = {}) {
    this.codes = { ...RESPONSE_CODES, ...extraCodes };
  }

  codeToMessage(code: string | number): string {
    const key = String(code).trim();
    return this.codes[key] ?? `Unrecognized response code ${key}`;
  }

  isSuccess(response: DecodedMap): boolean {
    return textOf(response.ResponseCode) === AUTH_SUCCESS_CODE;
  }

  /**
   * Code, best available message and the first nested message entry.
   * Message precedence: first Messages.Message text, then ResponseMessage,
   * then the code table.
   */
  errorFromResponse(response: DecodedMap): ResponseFailure {
    const code = textOf(response.ResponseCode);
    const first = this.messageEntries(response)[0];

    const message =
      this.messageText(first) ||
      textOf(response.ResponseMessage) ||
      this.codeToMessage(code);

    return first === undefined
      ? { code, message }
      : { code, message, details: first };
  }

  /**
   * Distinct MessageCode values across Messages.Message
   */
  messageCodes(response: DecodedMap): Set<string> {
    const codes = new Set<string>();
    for (const entry of this.messageEntries(response)) {
      if (isDecodedMap(entry)) {
        const code = textOf(entry.MessageCode);
        if (code) codes.add(code);
      }
    }
    return codes;
  }

  private messageEntries(response: DecodedMap): DecodedValue[] {
    const messages = response.Messages;
    return isDecodedMap(messages) ? asList(messages.Message) : [];
  }

  private messageText(entry: DecodedValue | undefined): string {
    if (typeof entry === "string") return entry.trim();
    if (!isDecodedMap(entry)) return "";
    for (const field of MESSAGE_TEXT_FIELDS) {
      const text = textOf(entry[field]);
      if (text) return text;
    }
    return "";
  }
}

const defaultNormalizer = new ResponseNormalizer();

export const codeToMessage = (code: string | number): string =>
  defaultNormalizer.codeToMessage(code);

export const errorFromResponse = (response: DecodedMap): ResponseFailure =>
  defaultNormalizer.errorFromResponse(response);

export const isSuccessResponse = (response: DecodedMap): boolean =>
  defaultNormalizer.isSuccess(response);

export const messageCodes = (response: DecodedMap): Set<string> =>
  defaultNormalizer.messageCodes(response);
