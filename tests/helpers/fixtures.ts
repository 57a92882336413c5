/**
 * Wallet histories shared by the pipeline and route tests, anchored at a
 * fixed clock so every expected number can be worked out by hand.
 *
 * ESTABLISHED, last 30 days: 3 native tx on 3 days, 2 stablecoin transfers
 * with 2 counterparties, first tx 400 days ago → 30 + 8 + 2 + 0 + 10 = 50.
 * Previous 30 days: 1 native + 1 token tx → 30 + 4 + 1 + 0 + 10 = 45.
 *
 * TOKENLESS: 3 native tx on 3 days, no token transfers → 30 + 6 + 10 - 25 = 21.
 */
import { ScoringPipeline } from '../../src/scoring/engine.js'
import type { Address } from '../../src/types.js'
import { DAY } from '../factories.js'
import { type ActionRows, FakeExplorer, fakeClock, row, testClient } from './explorer.js'

export const NOW_MS = 1_700_000_000_000
export const NOW_TS = NOW_MS / 1000

export const ESTABLISHED: Address = '0x00000000000000000000000000000000000000e1'
export const TOKENLESS: Address = '0x00000000000000000000000000000000000000e2'
const ALICE = '0x00000000000000000000000000000000000000a1'
const BOB = '0x00000000000000000000000000000000000000b0'
const USDC = '0x00000000000000000000000000000000000000c1'
const DAI = '0x00000000000000000000000000000000000000c2'

const ago = (days: number) => NOW_TS - days * DAY

function nativeHistory(wallet: Address, daysAgo: number[]) {
  return daysAgo.map((d) => row(ago(d), { from: wallet, to: ALICE }))
}

export function walletHistories(): Record<string, ActionRows> {
  return {
    [ESTABLISHED]: {
      txlist: nativeHistory(ESTABLISHED, [1, 2, 3, 35, 400]),
      tokentx: [
        row(ago(1), { from: ESTABLISHED, to: ALICE, tokenSymbol: 'USDC', contractAddress: USDC }),
        row(ago(5), { from: BOB, to: ESTABLISHED, tokenSymbol: 'DAI', contractAddress: DAI }),
        row(ago(40), { from: ESTABLISHED, to: ALICE, tokenSymbol: 'USDC', contractAddress: USDC }),
      ],
    },
    [TOKENLESS]: {
      txlist: nativeHistory(TOKENLESS, [1, 2, 3, 400]),
    },
  }
}

/** Pass `apiKey: ''` for a client without a credential. */
export function fixturePipeline(opts: { apiKey?: string } = {}) {
  const clock = fakeClock(NOW_MS)
  const explorer = new FakeExplorer(walletHistories())
  const client = testClient(explorer.fetch, clock, opts.apiKey ?? 'test-secret')
  const pipeline = new ScoringPipeline({ client, clock })
  return { clock, explorer, client, pipeline }
}
