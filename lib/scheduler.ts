// lib/scheduler.ts - Maps wall-clock time to one slice of the work matrix
import type { CategoryDef, RegionDef } from '@/config/regions'
import type { RefreshConfig } from '@/lib/config'

export type WorkItem = {
  region: RegionDef
  category: CategoryDef
}

export type BatchWindow = {
  index: number
  start: number
  end: number
  items: WorkItem[]
}

/** Region-major order: every category of a region before the next region */
export function buildWorkItems(
  config: Pick<RefreshConfig, 'regions' | 'categories'>
): WorkItem[] {
  const items: WorkItem[] = []
  for (const region of config.regions) {
    for (const category of config.categories) {
      items.push({ region, category })
    }
  }
  return items
}

export function workItemKey(item: WorkItem) {
  return `${item.region.key}/${item.category.key}`
}

function assertWindowsPerDay(windowsPerDay: number) {
  if (!Number.isInteger(windowsPerDay) || windowsPerDay < 1 || windowsPerDay > 24) {
    throw new RangeError(
      `windowsPerDay must be an integer between 1 and 24, got ${windowsPerDay}`
    )
  }
}

export function itemsPerWindow(totalItems: number, windowsPerDay: number) {
  assertWindowsPerDay(windowsPerDay)
  return Math.ceil(totalItems / windowsPerDay)
}

/** Index of the equal-length hour range containing the UTC hour of `now` */
export function windowIndexAt(now: Date, windowsPerDay: number): number {
  assertWindowsPerDay(windowsPerDay)
  return Math.floor((now.getUTCHours() * windowsPerDay) / 24)
}

export function sliceWindow(
  items: WorkItem[],
  index: number,
  windowsPerDay: number
): BatchWindow {
  assertWindowsPerDay(windowsPerDay)
  if (!Number.isInteger(index) || index < 0 || index >= windowsPerDay) {
    throw new RangeError(
      `window index must be between 0 and ${windowsPerDay - 1}, got ${index}`
    )
  }
  const size = itemsPerWindow(items.length, windowsPerDay)
  const start = Math.min(index * size, items.length)
  const end = Math.min(start + size, items.length)
  return { index, start, end, items: items.slice(start, end) }
}

export function selectBatchWindow(
  items: WorkItem[],
  now: Date,
  windowsPerDay: number
): BatchWindow {
  return sliceWindow(items, windowIndexAt(now, windowsPerDay), windowsPerDay)
}
