/**
 * A class for reading binary data from a Uint8Array buffer.
 * Multi-byte integers are read as fixed-width big-endian values. Reading past
 * the end of the buffer throws rather than returning undefined bytes.
 */
export class BufferReader {
  private buffer: Uint8Array;
  private view: DataView;
  private offset: number;

  /**
   * Creates a new BufferReader instance.
   * @param buffer - The Uint8Array to read from
   */
  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    this.offset = 0;
  }

  public readUInt8(): number {
    this.ensureAvailable(1);
    return this.buffer[this.offset++];
  }

  public readUInt16(): number {
    this.ensureAvailable(2);
    const value = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return value;
  }

  public readUInt32(): number {
    this.ensureAvailable(4);
    const value = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return value;
  }

  public readInt32(): number {
    this.ensureAvailable(4);
    const value = this.view.getInt32(this.offset, false);
    this.offset += 4;
    return value;
  }

  private ensureAvailable(length: number): void {
    if (this.offset + length > this.buffer.length) {
      throw new Error(
        `Unexpected end of buffer: needed ${length} bytes at offset ${this.offset} of ${this.buffer.length}`,
      );
    }
  }
}
