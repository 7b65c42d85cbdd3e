export {
    certificateTbs,
    certificateToJSON,
    issueCertificate,
    parseCertificate,
    serializeCertificate,
    signCertificate,
    verifyCertificate,
} from './certificate';
export { KemTlsClient } from './client';
export type { HandshakeChannel } from './handshake';
export {
    performClientHandshake,
    performServerHandshake,
    StreamChannel,
} from './handshake';
export type { KemTlsListenerOptions } from './listener';
export { KemTlsListener } from './listener';
export {
    createAlertMessage,
    createFinishedMessage,
    decodeFrame,
    encodeFrame,
    FrameDecoder,
} from './protocol';
export type { KemTlsServerIdentityOptions } from './server';
export { KemTlsServerHandshake, KemTlsServerIdentity } from './server';
