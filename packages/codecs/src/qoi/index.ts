export * from './types'
export { type ByteSink, type ByteSource, ByteReader, ByteWriter, readByteFrom, readFrom, writeTo } from './io'
export { readQoiHeader, writeQoiHeader } from './header'
export { QoiDecoder, decode, decodeChunks, decodeQoi } from './decoder'
export { PeekableIterator, QoiEncoder, encode, encodeQoi, pixelsFromBytes } from './encoder'
export { QoiCodec } from './codec'
