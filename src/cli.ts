#!/usr/bin/env node
/**
 * sendrelay CLI
 *
 * Commands:
 *   serve         Run the requester and agent APIs
 *   agent         Run a delivery agent against a server
 *   issue-code    Issue a one-time sender registration code
 *   token         Mint a requester bearer token
 *
 * Usage:
 *   sendrelay serve --port 8787
 *   sendrelay agent --server http://relay:8787 --command ./send.sh
 *   sendrelay issue-code --principal alice --max-role lead
 *   sendrelay token --principal alice --role lead
 */

const args = process.argv.slice(2);
const command = args[0];

switch (command) {
  case 'serve':
    import('./engine/cli-serve.js').then(m => m.runServe(args.slice(1))).catch(fatal);
    break;

  case 'agent':
    import('./runtime/cli-agent.js').then(m => m.runAgent(args.slice(1))).catch(fatal);
    break;

  case 'issue-code':
    import('./engine/cli-issue-code.js').then(m => m.runIssueCode(args.slice(1))).catch(fatal);
    break;

  case 'token':
    import('./auth/cli-token.js').then(m => m.runToken(args.slice(1))).catch(fatal);
    break;

  case undefined:
  case '--help':
  case '-h':
    console.log(`
sendrelay CLI

Commands:
  serve                   Run the server
    --port <n>            Listen port (default SENDRELAY_PORT or 8787)
    --db <path>           SQLite file (default SENDRELAY_DB_PATH or ./sendrelay.db)
  agent                   Run a delivery agent
    --server <url>        Server base URL (or SENDRELAY_SERVER_URL)
    --command <program>   Delivery program, called as: program <destination> <body>
    --credentials <path>  Encrypted credentials file
    --code <code>         Registration code (first run only)
    --name <name>         Sender display name (first run only)
    --destination <addr>  Sender address (first run only)
    --role <role>         Sender role (first run only)
    --batch <n>           Messages per dequeue (default 10, max 100)
    --poll-seconds <n>    Idle poll interval (default 5)
    --lease-seconds <n>   Lease length (default 60)
    --timeout-seconds <n> Per-message delivery deadline (default 30)
    --send-delay-ms <n>   Pause between sends (default 0)
  issue-code              Issue a registration code
    --principal <id>      Principal the sender belongs to
    --max-role <role>     Highest role the sender may claim
    --local               Sender runs beside the server
    --ttl-hours <n>       Code lifetime (default 24)
  token                   Mint a requester token (needs SENDRELAY_JWT_SECRET)
    --principal <id>
    --role <role>
    --ttl <span>          e.g. 1h, 7d (default 24h)
`);
    break;

  default:
    console.error(`Unknown command: ${command}. Run sendrelay --help.`);
    process.exit(1);
}

function fatal(err: Error) {
  console.error('Fatal error:', err.message);
  process.exit(1);
}
