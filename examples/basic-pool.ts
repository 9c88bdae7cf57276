/**
 * Basic Pool Example
 *
 * Seeds an E-CLP pool through the in-process vault, trades against it and
 * cycles liquidity, printing the amounts the pool computes at each step.
 *
 * Optional environment variables (see .env.example):
 * - ECLP_SWAP_FEE       swap fee, 18 decimals (default 0.1%)
 * - ECLP_PROTOCOL_FEE   protocol fee on invariant growth, 18 decimals (default 0)
 * - ECLP_LOG_LEVEL      'debug' to print every pool log line
 */

import 'dotenv/config';
import { StrKey } from '@stellar/stellar-sdk';
import { EclpPool } from '../src/pool';
import { MockVault } from '../src/test/mocks/MockVault';
import { Logger, TradeType } from '../src/types/common';
import { ProtocolFeeConfig } from '../src/types/fee';
import { EclpPoolError } from '../src/errors';
import { ONE } from '../src/utils/math';

const contract = (fill: number) => StrKey.encodeContract(Buffer.alloc(32, fill));
const account = (fill: number) => StrKey.encodeEd25519PublicKey(Buffer.alloc(32, fill));

function consoleLogger(verbose: boolean): Logger {
  return {
    debug: (msg, data) => {
      if (verbose) console.debug(msg, data ?? '');
    },
    info: (msg, data) => console.info(msg, data ?? ''),
    error: (msg, err) => console.error(msg, err ?? ''),
  };
}

function main(): void {
  const swapFee = BigInt(process.env.ECLP_SWAP_FEE ?? '1000000000000000');
  const protocolFee = BigInt(process.env.ECLP_PROTOCOL_FEE ?? '0');
  const verbose = process.env.ECLP_LOG_LEVEL === 'debug';

  const usdc = contract(1);
  const eurc = contract(2);
  const lp = account(3);

  // Stable pair concentrated around 1.0
  const pool = new EclpPool({
    tokens: [
      { address: usdc, decimals: 6, symbol: 'USDC' },
      { address: eurc, decimals: 6, symbol: 'EURC' },
    ],
    params: {
      alpha: 97n * 10n ** 16n,
      beta: 103n * 10n ** 16n,
      c: 707106781186547524n,
      s: 707106781186547524n,
      lambda: 400n * ONE,
    },
    swapFeePercentage: swapFee,
    oracleEnabled: true,
    logger: consoleLogger(verbose),
    onEvent: (event) => {
      if (verbose) console.log('event:', event.type);
    },
  });

  const fees: ProtocolFeeConfig = {
    protocolFeePercentage: protocolFee,
    gyroPortion: ONE / 2n,
    gyroTreasury: contract(5),
    protocolTreasury: contract(6),
  };

  const vault = new MockVault(pool);
  const seeded = vault.initialize(lp, [1_000_000n * 10n ** 6n, 1_000_000n * 10n ** 6n]);
  console.log(`Seeded pool, minted ${seeded.sharesOut} shares`);
  console.log(`Spot price: ${pool.getSpotPrice(vault.balances)}`);

  vault.advance();
  const trade = vault.swap({
    kind: TradeType.EXACT_IN,
    tokenIn: usdc,
    tokenOut: eurc,
    amount: 10_000n * 10n ** 6n,
  });
  console.log(`Swapped 10000 USDC for ${trade.amount} EURC units (fee ${trade.feeAmount})`);

  vault.advance();
  const join = vault.join(lp, seeded.sharesOut / 100n, fees);
  console.log(`Joined: paid ${join.amountsIn.join(' / ')}`);

  vault.advance();
  const exit = vault.exit(lp, seeded.sharesOut / 100n, fees);
  console.log(`Exited: received ${exit.amountsOut.join(' / ')}`);

  vault.advance(10);
  console.log(`Oracle state:`, pool.getState().oracle);
}

try {
  main();
} catch (err) {
  if (err instanceof EclpPoolError) {
    console.error(`Pool error [${err.code}]: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
}
