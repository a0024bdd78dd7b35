export function printHelp() {
    console.log(`
Usage:
  calculate [--region NSW] [--fte 10] [--electricity-kwh <kWh>] [fuel options] [--anaesthetics gas options]
            [--factors file.csv] [--config file.json] [--breakdown groups|combined|lines] [--json|--csv] [--out file.csv] [-v|-vv]
  check     [--factors file.csv] [--region NSW] [--anaesthetics] [--config file.json]
  serve     [--host 127.0.0.1] [--port 3000] [--factors file.csv] [--config file.json] [-v]
  help

Profile:
  --region <code>        NSW, QLD, VIC, SA, WA, TAS, ACT or NT (default: NSW)
  --fte <n>              FTE staff, intensity denominator (default: 0 = no intensity)
  --name <text>          Facility name (optional)
  --year <text>          Reporting year, ex: 2024-25 (optional)

Scope 2:
  --electricity-kwh <n>  Grid electricity used (kWh)

Scope 1 fuels:
  --petrol-l <n>         Petrol (L)
  --diesel-l <n>         Diesel (L)
  --lpg-l <n>            LPG (L)
  --natural-gas-mj <n>   Natural gas (MJ)

Scope 1 anaesthetic gases (only with --anaesthetics):
  --isoflurane-g <n>     Isoflurane (g)
  --sevoflurane-g <n>    Sevoflurane (g)
  --desflurane-g <n>     Desflurane (g)
  --n2o-g <n>            Nitrous oxide (g)

Output:
  --breakdown <mode>     groups (default), combined or lines
  --json                 Print JSON output (machine-readable)
  --csv                  Print the Metric,Value_kgCO2e export
  --out <file>           Write the Metric,Value_kgCO2e export to a file

  --factors <file>       Emission factor CSV (default: bundled nga_factors_2024.csv)
  --config <file>        JSON config file
  -v / --verbose         Debug logs and factor provenance
  -vv                    Adds the raw result as JSON
`);
}
