/**
 * Bitcoin-family address codec
 *
 * Validates base58check and bech32/bech32m addresses with bitcoinjs-lib
 * against one set of network parameters. Works for any coin whose address
 * formats follow Bitcoin's (Litecoin, Parkbyte, testnets, regtest).
 */

import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';
import { createLogger } from '../utils/logger';
import { PaymentAddress } from './address';
import type { AddressCodec, CurrencyType } from './types';

// Required by bitcoinjs-lib v6+ for bech32m (Taproot) address validation
bitcoin.initEccLib(ecc);

const log = createLogger('CURRENCIES:BITCOIN');

export class BitcoinAddressCodec implements AddressCodec {
  constructor(private readonly network: bitcoin.Network) {}

  decode(currency: CurrencyType, token: string): PaymentAddress | null {
    try {
      bitcoin.address.toOutputScript(token, this.network);
    } catch (error) {
      log.debug('Address rejected', {
        currency: currency.id,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    return new PaymentAddress(currency, token);
  }
}

export const litecoinNetwork: bitcoin.Network = {
  messagePrefix: '\x19Litecoin Signed Message:\n',
  bech32: 'ltc',
  bip32: {
    public: 0x019da462,
    private: 0x019d9cfe,
  },
  pubKeyHash: 0x30,
  scriptHash: 0x32,
  wif: 0xb0,
};

// Parkbyte test network: base58 only, testnet version bytes
export const parkbyteTestNetwork: bitcoin.Network = {
  messagePrefix: '\x19Parkbyte Signed Message:\n',
  bech32: 'tpkb',
  bip32: {
    public: 0x043587cf,
    private: 0x04358394,
  },
  pubKeyHash: 0x6f,
  scriptHash: 0xc4,
  wif: 0xef,
};
