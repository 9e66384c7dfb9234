// scripts/refresh.ts
import './_env'
import { loadConfig } from '@/lib/config'
import {
  createRefreshDeps,
  runRefresh,
  type RefreshReport,
} from '@/lib/services/refreshService'

export type CliOptions = {
  windowIndex?: number
  updatesPath?: string
  dryRun?: boolean
}

export async function run(opts: CliOptions = {}): Promise<RefreshReport> {
  const config = loadConfig()
  console.log(
    `🔄 Starting content refresh (${config.regions.length} regions × ${config.categories.length} categories, ${config.runsPerDay} runs/day)`
  )
  return runRefresh(createRefreshDeps(config), opts)
}

function parseWindow(value: string): number | undefined {
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed >= 0) return parsed
  console.warn(`⚠️  Invalid --window value "${value}"; ignoring`)
  return undefined
}

export function parseCliArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {}

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === '--dry-run') {
      opts.dryRun = true
      continue
    }

    if (arg === '--window' || arg === '-w' || arg === '--output' || arg === '-o') {
      const next = argv[i + 1]
      if (!next) {
        console.warn(`⚠️  ${arg} flag provided without a value; ignoring`)
        continue
      }
      if (arg === '--window' || arg === '-w') opts.windowIndex = parseWindow(next)
      else opts.updatesPath = next
      i++
      continue
    }

    const windowMatch = arg.match(/^--window=(.+)$/)
    if (windowMatch) {
      opts.windowIndex = parseWindow(windowMatch[1])
      continue
    }

    const outputMatch = arg.match(/^--output=(.+)$/)
    if (outputMatch) {
      opts.updatesPath = outputMatch[1]
      continue
    }

    console.warn(`⚠️  Unknown argument "${arg}"; ignoring`)
  }

  return opts
}

// CLI support: `npm run refresh`
if (import.meta.url === `file://${process.argv[1]}`) {
  const cliOpts = parseCliArgs(process.argv.slice(2))
  run(cliOpts)
    .then((report) => {
      console.log('\n📊 Final results:', {
        window: report.window,
        updated: report.items.filter((i) => i.status === 'updated').length,
        unchanged: report.items.filter((i) => i.status === 'unchanged').length,
        failed: report.items.filter((i) => i.status === 'failed').length,
        persisted: report.persisted,
      })
      process.exit(report.persisted || cliOpts.dryRun ? 0 : 1)
    })
    .catch((err) => {
      console.error('❌ Fatal error:', err)
      process.exit(1)
    })
}
