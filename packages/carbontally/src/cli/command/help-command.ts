export function printHelp() {
    console.log(`
Usage:
  calc --input <activity.json> [--period as-reported|weekly] [--refine] [--json] [-v|-vv]
  offsets --total <kg> [--json]
  offsets --input <activity.json> [--json]
  suggest --input <activity.json> [--json]
  suggest --breakdown <breakdown.json> [--json]
  serve [--host 127.0.0.1] [--port 3000] [--log-level info]

Options:
  --input <file>         Activity payload (snake_case JSON, see README)
  --breakdown <file>     Category -> kg CO2 object, instead of an activity payload
  --total <kg>           Footprint in kg CO2 to offset

  --period <p>           as-reported (default) or weekly
  --refine               Add the refined estimate and its insights
  --factors <file>       Emission factor table (default: bundled data/emission_factors.json)
  --config <file>        Config file (default: ./carbontally.config.json when present)

  --host <addr>          serve: bind address (default: 127.0.0.1)
  --port <port>          serve: port (default: 3000)
  --log-level <level>    serve: fatal|error|warn|info|debug|trace|silent

  --json                 Print JSON output (machine-readable)
  -v / --verbose         Show per-subtype details and where settings came from
  -vv                    calc: also list every emission factor and its source

Signals (serve):
  SIGHUP                 Reload the emission factor table
  SIGINT                 Stop the server
`);
}
