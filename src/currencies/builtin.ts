/**
 * Built-in currencies
 */

import * as bitcoin from 'bitcoinjs-lib';
import type { BuiltinCurrencyId } from '../config/schema';
import { BitcoinAddressCodec, litecoinNetwork, parkbyteTestNetwork } from './bitcoinCodec';
import type { CurrencyType } from './types';

export const BUILTIN_CURRENCIES: Readonly<Record<BuiltinCurrencyId, CurrencyType>> = {
  bitcoin: {
    id: 'bitcoin',
    name: 'Bitcoin',
    symbol: 'BTC',
    uriScheme: 'bitcoin',
    unitExponent: 8,
    addressCodec: new BitcoinAddressCodec(bitcoin.networks.bitcoin),
  },
  'bitcoin-testnet': {
    id: 'bitcoin-testnet',
    name: 'Bitcoin Testnet',
    symbol: 'tBTC',
    uriScheme: 'bitcoin',
    unitExponent: 8,
    addressCodec: new BitcoinAddressCodec(bitcoin.networks.testnet),
  },
  'bitcoin-regtest': {
    id: 'bitcoin-regtest',
    name: 'Bitcoin Regtest',
    symbol: 'rBTC',
    uriScheme: 'bitcoin',
    unitExponent: 8,
    addressCodec: new BitcoinAddressCodec(bitcoin.networks.regtest),
  },
  litecoin: {
    id: 'litecoin',
    name: 'Litecoin',
    symbol: 'LTC',
    uriScheme: 'litecoin',
    unitExponent: 8,
    addressCodec: new BitcoinAddressCodec(litecoinNetwork),
  },
  'parkbyte-test': {
    id: 'parkbyte-test',
    name: 'Parkbyte Test',
    symbol: 'PKBTEST',
    uriScheme: 'parkbyte',
    unitExponent: 6,
    addressCodec: new BitcoinAddressCodec(parkbyteTestNetwork),
  },
};
