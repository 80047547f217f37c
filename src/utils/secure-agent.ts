/**
 * HTTP(S) agents that refuse to connect to private addresses.
 * The check runs on the resolved IPs at connection time, so it also covers
 * redirects and hostnames that resolve to loopback or private networks.
 */

import dns from 'dns';
import http from 'http';
import https from 'https';
import type { LookupFunction } from 'net';
import { isPrivateHost } from './validators';

/**
 * dns.lookup that fails when any resolved address is private, loopback or link-local
 */
export const publicOnlyLookup: LookupFunction = (hostname, options, callback) => {
  dns.lookup(hostname, { ...options, all: true }, (error, addresses) => {
    if (error) {
      callback(error, '');
      return;
    }

    const blocked = addresses.filter((entry) => isPrivateHost(entry.address)).map((entry) => entry.address);
    if (addresses.length === 0 || blocked.length > 0) {
      const reason =
        addresses.length === 0
          ? `No addresses resolved for ${hostname}`
          : `Connection to ${hostname} blocked: resolves to private address ${blocked.join(', ')}`;
      callback(Object.assign(new Error(reason), { code: 'EPRIVATEADDR', hostname }), '');
      return;
    }

    if (options.all) {
      callback(null, addresses);
    } else {
      callback(null, addresses[0].address, addresses[0].family);
    }
  });
};

let httpAgent: http.Agent | undefined;
let httpsAgent: https.Agent | undefined;

export function getPublicHttpAgent(): http.Agent {
  if (!httpAgent) {
    httpAgent = new http.Agent({ keepAlive: true, lookup: publicOnlyLookup });
  }
  return httpAgent;
}

export function getPublicHttpsAgent(): https.Agent {
  if (!httpsAgent) {
    httpsAgent = new https.Agent({ keepAlive: true, lookup: publicOnlyLookup });
  }
  return httpsAgent;
}
