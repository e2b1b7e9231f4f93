/**
 * A class for writing binary data to a Uint8Array buffer.
 * All multi-byte integers are written as fixed-width big-endian values.
 * The buffer automatically expands as needed.
 */
export class BufferWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset: number;

  /**
   * Creates a new BufferWriter instance.
   * @param initialLength - The initial size of the buffer in bytes
   */
  constructor(initialLength: number) {
    this.buffer = new Uint8Array(Math.max(1, initialLength));
    this.view = new DataView(this.buffer.buffer);
    this.offset = 0;
  }

  /**
   * Writes an unsigned 8-bit integer to the buffer.
   * @param value - The value to write (will be truncated to 8 bits)
   */
  public writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.offset] = value & 0xff;
    this.offset += 1;
  }

  /**
   * Writes an unsigned 16-bit big-endian integer.
   * @throws Error if the value does not fit in 16 unsigned bits
   */
  public writeUint16(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new Error(`Value ${value} is not a valid uint16`);
    }
    this.ensureCapacity(2);
    this.view.setUint16(this.offset, value, false);
    this.offset += 2;
  }

  /**
   * Writes an unsigned 32-bit big-endian integer.
   * @throws Error if the value does not fit in 32 unsigned bits
   */
  public writeUint32(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new Error(`Value ${value} is not a valid uint32`);
    }
    this.ensureCapacity(4);
    this.view.setUint32(this.offset, value, false);
    this.offset += 4;
  }

  /**
   * Writes a signed 32-bit big-endian (two's complement) integer.
   * @throws Error if the value does not fit in 32 signed bits
   */
  public writeInt32(value: number): void {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw new Error(`Value ${value} is not a valid int32`);
    }
    this.ensureCapacity(4);
    this.view.setInt32(this.offset, value, false);
    this.offset += 4;
  }

  /**
   * Gets the written bytes as a Uint8Array.
   * @returns A view over only the written bytes
   */
  public getBuffer(): Uint8Array {
    return this.buffer.subarray(0, this.offset);
  }

  private ensureCapacity(neededSpace: number): void {
    while (this.offset + neededSpace > this.buffer.length) {
      this.expandBuffer();
    }
  }

  /**
   * Expands the buffer by doubling its current length.
   */
  private expandBuffer(): void {
    const newBuffer = new Uint8Array(this.buffer.length * 2);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }
}
