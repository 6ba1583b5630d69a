/**
 * TLS leaf certificate fingerprinting for OIDC issuers
 */

import { connect } from 'node:tls';
import type { FingerprintFetcher } from './identity-provider.js';

const CONNECT_TIMEOUT_MS = 10_000;

/**
 * Connects to `host:443`, reads the peer's leaf certificate and resolves its
 * SHA-1 fingerprint as reported by Node ("AA:BB:..." form).
 */
export const fetchLeafCertificateFingerprint: FingerprintFetcher = (host: string) =>
  new Promise((resolve, reject) => {
    const socket = connect({ host, port: 443, servername: host });

    socket.setTimeout(CONNECT_TIMEOUT_MS, () => {
      socket.destroy();
      reject(new Error(`TLS connection to ${host} timed out after ${CONNECT_TIMEOUT_MS / 1000}s`));
    });

    socket.once('secureConnect', () => {
      const certificate = socket.getPeerCertificate();
      socket.end();
      if (!certificate || !certificate.fingerprint) {
        reject(new Error(`${host} presented no certificate`));
        return;
      }
      resolve(certificate.fingerprint);
    });

    socket.once('error', error => {
      socket.destroy();
      reject(error);
    });
  });
