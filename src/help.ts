/**
 * Help text
 */

export const HELP_TEXT = `relay-ledger: relay server snapshot ledger

🗄️  Database Commands:
  init [--force]              Create the ledger database (--force recreates it)
  check                       Verify schema, columns and SQLite integrity

🔄 Sync Commands:
  sync                        Fetch the feed, reconcile, save the changes
  sync --file <path>          Use a snapshot file instead of the feed
  sync --url <url>            Fetch from a different feed URL
  sync --dry-run              Reconcile and report without writing

📡 Server Commands:
  list                        Stored servers with their latest stats
  show <name>                 One server with its stat and test history
  probe <name> --ping <ms> --speed <bps>
                              Record a connectivity test you ran yourself
  export <name> [--dir <path>]
                              Write the server's OpenVPN profile to <name>.ovpn
  export --all [--dir <path>] Write profiles for every stored server

Environment:
  RELAY_LEDGER_HOME           Data directory (default ~/.relay-ledger)
  RELAY_LEDGER_DB             Database path (default <home>/ledger.db)
  RELAY_LEDGER_FEED_URL       Snapshot feed URL
  RELAY_LEDGER_FETCH_TIMEOUT  Fetch timeout in ms (default 10000)
  RELAY_LEDGER_LOG_LEVEL      debug | info | warn | error (default info)

Human-readable output goes to stderr, JSON to stdout.
`;
