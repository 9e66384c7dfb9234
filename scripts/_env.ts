// scripts/_env.ts
import { config } from 'dotenv'

// Load .env.local first, then .env as fallback; real env always wins
config({ path: '.env.local', override: false })
config({ path: '.env', override: false })

// Map other common names if needed
if (!process.env.NEWSAPI_KEY && process.env.NEWS_API_KEY) {
  process.env.NEWSAPI_KEY = process.env.NEWS_API_KEY
}
