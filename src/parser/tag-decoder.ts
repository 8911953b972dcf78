import { DecodeErrorCode, TLVDecodeError, captureDecode } from "../common/errors.js";
import type { DecodeResult } from "../common/errors.js";
import { TagClass } from "../common/types.js";
import type { DecodedElement, TagInfo } from "../common/types.js";

// Largest value the length accumulator may hold before the next shift overflows.
const MAX_LENGTH_BEFORE_SHIFT = Math.floor(Number.MAX_SAFE_INTEGER / 256);

export class TagDecoder {
  /**
   * Decode exactly one TLV header and bind its content.
   * @param window - Bytes starting at the identifier octet.
   * @param depth - Nesting level recorded on the element.
   * @param offset - Absolute position of `window[0]` in the scanned buffer.
   * @returns The element and the number of bytes it spans.
   * @throws TLVDecodeError when the header is malformed or the content does
   * not fit in the window.
   */
  public static decode(
    window: Uint8Array,
    depth = 0,
    offset = 0,
  ): DecodedElement {
    const where = { offset, depth };
    if (window.length < 2) {
      throw new TLVDecodeError(
        DecodeErrorCode.TruncatedHeader,
        `Need at least 2 header bytes at offset ${offset}; ${window.length} available`,
        where,
      );
    }

    const tag = this.readTagInfo(window[0], where);
    const lengthInfo = this.readLength(window, 1, where);
    const headerLength = lengthInfo.newOffset;
    const rawContent = this.readValue(
      window,
      headerLength,
      lengthInfo.length,
      where,
    );

    return {
      element: {
        ...tag,
        depth,
        offset,
        headerLength,
        contentLength: lengthInfo.length,
        rawContent,
      },
      consumed: headerLength + lengthInfo.length,
    };
  }

  /**
   * Split the identifier octet. Only the low-tag-number form is accepted.
   */
  protected static readTagInfo(
    firstByte: number,
    where: { offset: number; depth: number },
  ): TagInfo {
    const tagClass = this.getTagClass((firstByte & 0xc0) >> 6);
    const constructed = (firstByte & 0x20) !== 0;
    const tagNumber = firstByte & 0x1f;

    if (tagNumber === 0x1f) {
      throw new TLVDecodeError(
        DecodeErrorCode.UnsupportedLongFormTag,
        `High-tag-number form (0x${firstByte.toString(16)}) is not supported at offset ${where.offset}`,
        where,
      );
    }
    return { tagClass, constructed, tagNumber };
  }

  protected static getTagClass(bits: number): TagClass {
    switch (bits & 0x03) {
      case 0:
        return TagClass.Universal;
      case 1:
        return TagClass.Application;
      case 2:
        return TagClass.ContextSpecific;
      default:
        return TagClass.Private;
    }
  }

  /**
   * Read the length octets starting at `position`.
   * @returns The declared content length and the position after the header.
   */
  protected static readLength(
    window: Uint8Array,
    position: number,
    where: { offset: number; depth: number },
  ): { length: number; newOffset: number } {
    const first = window[position++];
    if ((first & 0x80) === 0) {
      return { length: first, newOffset: position };
    }

    const numBytes = first & 0x7f;
    if (numBytes === 0) {
      throw new TLVDecodeError(
        DecodeErrorCode.IndefiniteLengthUnsupported,
        `Indefinite length encoding at offset ${where.offset} is not supported`,
        where,
      );
    }
    if (position + numBytes > window.length) {
      throw new TLVDecodeError(
        DecodeErrorCode.TruncatedLength,
        `Length needs ${numBytes} octets at offset ${where.offset}; ${window.length - position} available`,
        where,
      );
    }

    let length = 0;
    for (let i = 0; i < numBytes; i++) {
      if (length > MAX_LENGTH_BEFORE_SHIFT) {
        throw new TLVDecodeError(
          DecodeErrorCode.LengthOverflow,
          `Length of ${numBytes} octets at offset ${where.offset} exceeds ${Number.MAX_SAFE_INTEGER}`,
          where,
        );
      }
      length = length * 256 + window[position++];
    }
    return { length, newOffset: position };
  }

  /**
   * Bind the content octets as a view over the window.
   */
  protected static readValue(
    window: Uint8Array,
    position: number,
    length: number,
    where: { offset: number; depth: number },
  ): Uint8Array {
    if (length > window.length - position) {
      throw new TLVDecodeError(
        DecodeErrorCode.TruncatedContent,
        `Declared length ${length} at offset ${where.offset} exceeds the ${window.length - position} bytes available`,
        where,
      );
    }
    return window.subarray(position, position + length);
  }
}

/**
 * Non-throwing form of {@link TagDecoder.decode}.
 */
export function decodeElement(
  window: Uint8Array,
  depth = 0,
  offset = 0,
): DecodeResult<DecodedElement> {
  return captureDecode(() => TagDecoder.decode(window, depth, offset));
}
