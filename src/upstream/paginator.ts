/**
 * Window paginator — pages one activity category newest-first and keeps the
 * rows that fall inside a time window.
 *
 * The explorer caps `page * offset` at 10,000, so at most MAX_PAGES pages of
 * PAGE_SIZE rows are reachable. A wallet that still returns full pages at the
 * last page is flagged `truncated`: its counts are a lower bound.
 */
import { z } from 'zod'
import { CATEGORY_ACTIONS, PAGINATION_CONFIG } from '../config/constants.js'
import { childLogger } from '../logger.js'
import type {
  ActivityCategory,
  ActivityRecord,
  Address,
  FirstActivity,
  PageRequest,
  SortOrder,
  TimeWindow,
  WindowFetch,
} from '../types.js'
import type { ExplorerClient } from './explorerClient.js'

const clog = childLogger('paginator')

const rowSchema = z.object({
  hash: z.string().optional(),
  timeStamp: z.union([z.string(), z.number()]),
  from: z.string().optional(),
  to: z.string().optional(),
  tokenSymbol: z.string().optional(),
  contractAddress: z.string().optional(),
})

function parseTimestamp(value: string | number): number | null {
  if (typeof value === 'number') return Number.isSafeInteger(value) ? value : null
  const trimmed = value.trim()
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null
}

/** Normalize one raw explorer row; rows without a usable timeStamp are dropped. */
export function toActivityRecord(raw: unknown, category: ActivityCategory): ActivityRecord | null {
  const parsed = rowSchema.safeParse(raw)
  if (!parsed.success) return null
  const timestamp = parseTimestamp(parsed.data.timeStamp)
  if (timestamp === null) return null

  return {
    hash: parsed.data.hash ?? '',
    timestamp,
    from: parsed.data.from ?? '',
    to: parsed.data.to ?? '',
    tokenSymbol: parsed.data.tokenSymbol,
    contractAddress: parsed.data.contractAddress,
    category,
  }
}

export function isInWindow(timestamp: number, window: TimeWindow): boolean {
  return timestamp >= window.startTs && timestamp <= window.endTs
}

function pageRequest(category: ActivityCategory, address: Address, page: number, sort: SortOrder): PageRequest {
  return { category, address, page, offset: PAGINATION_CONFIG.PAGE_SIZE, sort }
}

export async function fetchWindow(
  client: ExplorerClient,
  category: ActivityCategory,
  address: Address,
  window: TimeWindow,
  sort: SortOrder = 'desc',
): Promise<WindowFetch> {
  const records: ActivityRecord[] = []
  let truncated = false
  let pagesFetched = 0

  for (let page = 1; page <= PAGINATION_CONFIG.MAX_PAGES; page++) {
    const req = pageRequest(category, address, page, sort)
    const res = await client.call({
      action: CATEGORY_ACTIONS[category],
      address: req.address,
      page: req.page,
      offset: req.offset,
      sort: req.sort,
    })
    if (!res.ok) {
      clog.warn({ category, page, code: res.error.code }, 'page fetch failed, abandoning window')
      return { records: [], error: res.error, truncated: false, pagesFetched }
    }
    pagesFetched++

    const rows = res.rows
    if (rows.length === 0) break

    let minTs: number | null = null
    for (const raw of rows) {
      const record = toActivityRecord(raw, category)
      if (!record) continue
      if (minTs === null || record.timestamp < minTs) minTs = record.timestamp
      if (isInWindow(record.timestamp, window)) records.push(record)
    }

    // Newest-first: once a page reaches past the window start, later pages are older still
    if (sort === 'desc' && minTs !== null && minTs < window.startTs) break

    if (rows.length < req.offset) break

    if (page === PAGINATION_CONFIG.MAX_PAGES) {
      truncated = true
      clog.info({ category, address }, 'pagination ceiling reached, history truncated')
    }
  }

  return { records, error: null, truncated, pagesFetched }
}

/** Earliest native transaction ever, independent of any window. */
export async function fetchFirstActivity(client: ExplorerClient, address: Address): Promise<FirstActivity> {
  const res = await client.call({
    action: CATEGORY_ACTIONS.native,
    address,
    page: 1,
    offset: 1,
    sort: 'asc',
  })
  if (!res.ok) return { timestamp: null, error: res.error }

  const first = res.rows.length > 0 ? toActivityRecord(res.rows[0], 'native') : null
  return { timestamp: first?.timestamp ?? null, error: null }
}
