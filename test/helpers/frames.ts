// test/helpers/frames.ts

/** Successful response ADU: MBAP + function code + byte count + data */
export function responseBytes(
  transactionId: number,
  unitId: number,
  functionCode: number,
  data: number[]
): Uint8Array {
  const length = data.length + 3;
  return Uint8Array.from([
    (transactionId >> 8) & 0xff,
    transactionId & 0xff,
    0x00,
    0x00,
    (length >> 8) & 0xff,
    length & 0xff,
    unitId,
    functionCode,
    data.length,
    ...data,
  ]);
}

/** Exception response ADU: function code with the high bit set, then the exception code */
export function exceptionBytes(
  transactionId: number,
  unitId: number,
  functionCode: number,
  exceptionCode: number
): Uint8Array {
  return Uint8Array.from([
    (transactionId >> 8) & 0xff,
    transactionId & 0xff,
    0x00,
    0x00,
    0x00,
    0x03,
    unitId,
    functionCode | 0x80,
    exceptionCode,
  ]);
}
