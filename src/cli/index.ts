/**
 * falak CLI
 *
 * Commands:
 *   falak prayer <lat> <lon> [date] [preset]    Print prayer times
 *   falak fasting [date] [adjustment]           Print the fasting ruling for a day
 *   falak hilal <lat> <lon> [date] [criteria]   Print crescent visibility at sunset
 *   falak daud [date] [count]                   Print alternate-day fasting dates
 */

import type { Result } from '../errors/index.js'
import { USAGE, daudCommand, fastingCommand, hilalCommand, prayerCommand } from './commands.js'

const args = process.argv.slice(2)
const command = args[0]

function main() {
  const rest = args.slice(1)
  const now = new Date()

  switch (command) {
    case 'prayer':
      print(prayerCommand(rest, now))
      break
    case 'fasting':
      print(fastingCommand(rest, now))
      break
    case 'hilal':
      print(hilalCommand(rest, now))
      break
    case 'daud':
      print(daudCommand(rest, now))
      break
    default:
      printHelp()
      process.exit(command && command !== 'help' ? 1 : 0)
  }
}

function printHelp() {
  console.log(USAGE)
}

function print(result: Result<string[]>) {
  if (!result.ok) {
    console.error(result.error.message)
    process.exit(1)
  }
  for (const line of result.value) console.log(line)
}

main()
