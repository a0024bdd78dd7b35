import test, { before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { NotFoundError } from "@clinic-carbon/emission-core";
import {
  extractVerbosity,
  formatCommandError,
  parseNonNegativeNumberFromCommand,
  parsePortFromCommand,
  parseRegionFromCommand,
} from "./command/command-utils.js";
import { calculateCommand, parseCalculateArgs } from "./command/calculate-command.js";
import { checkCommand } from "./command/check-command.js";

const FACTORS = [
  "category,subcategory,unit,factor,state,source,source_year",
  "electricity,,kWh,0.79,NSW,DCCEEW NGA,2024",
  "fuel,petrol_L,L,2.31,,DCCEEW NGA,2024",
  "fuel,diesel_L,L,2.7,,DCCEEW NGA,2024",
  "fuel,lpg_L,L,1.5,,DCCEEW NGA,2024",
  "fuel,natural_gas_MJ,MJ,0.05,,DCCEEW NGA,2024",
].join("\n");

let dir: string;
let factorsFile: string;

before(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "clinic-carbon-cli-"));
  factorsFile = path.join(dir, "factors.csv");
  await writeFile(factorsFile, FACTORS, "utf-8");
});

after(async () => {
  await rm(dir, { recursive: true, force: true });
});

test('extractVerbosity', () => {
  const rest = ['--region', 'NSW'];
  assert.deepStrictEqual(extractVerbosity(['--region', 'NSW', '--verbose']), { level: 1, rest });
  assert.deepStrictEqual(extractVerbosity(['-v', '--region', 'NSW']), { level: 1, rest });
  assert.deepStrictEqual(extractVerbosity(['--region', 'NSW', '-vv']), { level: 2, rest });
  assert.deepStrictEqual(extractVerbosity(['--region', 'NSW']), { level: 0, rest });
});

test('parseNonNegativeNumberFromCommand', () => {
  assert.equal(parseNonNegativeNumberFromCommand('--fte', undefined, 10), 10);
  assert.equal(parseNonNegativeNumberFromCommand('--fte', '0', 10), 0);
  assert.equal(parseNonNegativeNumberFromCommand('--petrol-l', '12.5', 0), 12.5);
  assert.throws(() => parseNonNegativeNumberFromCommand('--petrol-l', '-1', 0), /--petrol-l must be a non-negative number/);
  assert.throws(() => parseNonNegativeNumberFromCommand('--petrol-l', 'abc', 0), /non-negative/);
  assert.throws(() => parseNonNegativeNumberFromCommand('--petrol-l', '', 0), /non-negative/);
});

test('parseRegionFromCommand / parsePortFromCommand', () => {
  assert.equal(parseRegionFromCommand('--region', 'vic'), 'VIC');
  assert.equal(parseRegionFromCommand('--region', undefined), undefined);
  assert.throws(() => parseRegionFromCommand('--region', 'NZ'), /--region must be one of NSW, QLD, VIC, SA, WA, TAS, ACT, NT/);
  assert.equal(parsePortFromCommand('--port', '8080'), 8080);
  assert.throws(() => parsePortFromCommand('--port', '70000'), /--port must be a port number/);
});

test('formatCommandError', () => {
  const notFound = new NotFoundError({ category: 'fuel', subcategory: 'diesel_L' });
  assert.strictEqual(
    formatCommandError(notFound),
    "[not_found] no emission factor found for category='fuel', subcategory='diesel_L', state='none'"
  );
  assert.strictEqual(formatCommandError(new Error('Use either --json or --csv (or none)')), '[error] Use either --json or --csv (or none)');
  assert.strictEqual(formatCommandError(new Error('[--factors]: file_not_found ./nga.csv')), '[--factors]: file_not_found ./nga.csv');
  assert.strictEqual(formatCommandError('stopped'), '[error] stopped');
});

test('parseCalculateArgs', async (t) => {
  await t.test('maps quantity flags to activity keys', () => {
    const args = parseCalculateArgs([
      '--region', 'qld', '--fte', '3',
      '--electricity-kwh', '1000', '--natural-gas-mj', '250',
      '--anaesthetics', '--n2o-g', '40',
      '--name', 'Harbour Clinic', '--year', '2024-25', '-v',
    ]);
    assert.equal(args.region, 'QLD');
    assert.equal(args.fte, 3);
    assert.equal(args.verbosity, 1);
    assert.equal(args.includeAnaesthetics, true);
    assert.deepEqual(args.quantities, { electricity_kWh: 1000, natural_gas_MJ: 250, n2o_g: 40 });
    assert.deepEqual(args.facility, { name: 'Harbour Clinic', reportingYear: '2024-25' });
  });

  await t.test('defaults', () => {
    const args = parseCalculateArgs([]);
    assert.equal(args.region, undefined);
    assert.equal(args.fte, 0);
    assert.equal(args.includeAnaesthetics, undefined);
    assert.equal(args.facility, undefined);
    assert.deepEqual(args.quantities, {});
  });

  await t.test('rejects bad values', () => {
    assert.throws(() => parseCalculateArgs(['--diesel-l=-4']), /--diesel-l must be a non-negative number/);
    assert.throws(() => parseCalculateArgs(['--diesel-l', '-4']), /^Error: \[arguments\] Option '--diesel-l' argument is ambiguous/);
    assert.throws(() => parseCalculateArgs(['--breakdown', 'pie']), /--breakdown must be one of groups, combined, lines/);
    assert.throws(() => parseCalculateArgs(['--json', '--csv']), /Use either --json or --csv/);
    assert.throws(() => parseCalculateArgs(['--unknown-flag']), /\[arguments\] Unknown option '--unknown-flag'/);
  });
});

test('calculateCommand', async (t) => {
  await t.test('prints the two-column export', async (t) => {
    const log = t.mock.method(console, 'log', () => {});
    await calculateCommand([
      '--factors', factorsFile, '--region', 'NSW', '--fte', '4',
      '--electricity-kwh', '1000', '--petrol-l', '100', '--csv',
    ]);

    assert.equal(log.mock.callCount(), 1);
    assert.equal(log.mock.calls[0].arguments[0], [
      'Metric,Value_kgCO2e',
      'Scope 1 (fuels),231',
      'Scope 1 (anaesthetic gases),0',
      'Scope 1 (total),231',
      'Scope 2 (electricity),790',
      'Total (kgCO2e),1021',
    ].join('\n'));
  });

  await t.test('prints the JSON report', async (t) => {
    const log = t.mock.method(console, 'log', () => {});
    await calculateCommand([
      '--factors', factorsFile, '--fte', '0', '--electricity-kwh', '1000',
      '--name', 'Harbour Clinic', '--json',
    ]);

    const report = JSON.parse(String(log.mock.calls[0].arguments[0]));
    assert.deepEqual(report.facility, { name: 'Harbour Clinic' });
    assert.equal(report.result.region, 'NSW');
    assert.equal(report.result.total_kgCO2e, 790);
    assert.deepEqual(report.result.intensity, { defined: false, kgCO2ePerFte: null });
    assert.equal(report.metrics.rows.length, 5);
  });

  await t.test('writes the export with --out', async (t) => {
    t.mock.method(console, 'log', () => {});
    const out = path.join(dir, 'results.csv');
    await calculateCommand(['--factors', factorsFile, '--petrol-l', '100', '--breakdown', 'combined', '--out', out]);

    assert.equal(await readFile(out, 'utf-8'), [
      'Metric,Value_kgCO2e',
      'Scope 1 (total),231',
      'Scope 2 (electricity),0',
      'Total (kgCO2e),231',
      '',
    ].join('\n'));
  });

  await t.test('fails when anaesthetics are included but missing', async (t) => {
    t.mock.method(console, 'log', () => {});
    await assert.rejects(
      calculateCommand(['--factors', factorsFile, '--anaesthetics', '--isoflurane-g', '5']),
      { name: 'NotFoundError', category: 'anaes', subcategory: 'isoflurane_g' }
    );
  });

  await t.test('uses the bundled table by default', async (t) => {
    const log = t.mock.method(console, 'log', () => {});
    await calculateCommand(['--electricity-kwh', '1000', '--json']);

    const report = JSON.parse(String(log.mock.calls[0].arguments[0]));
    assert.equal(report.result.scope2_kgCO2e, 660);
    assert.equal(report.result.lines[0].source, 'DCCEEW NGA (placeholder)');
  });
});

test('checkCommand', async (t) => {
  await t.test('bundled table covers every key', async (t) => {
    const log = t.mock.method(console, 'log', () => {});
    await checkCommand(['--anaesthetics']);

    const last = log.mock.calls[log.mock.callCount() - 1].arguments[0];
    assert.equal(last, '\nAll 16 factors resolved.');
  });

  await t.test('reports what is missing', async (t) => {
    const log = t.mock.method(console, 'log', () => {});
    await assert.rejects(checkCommand(['--factors', factorsFile]), { message: '7 of 12 factor(s) missing or invalid' });

    const lines = log.mock.calls.map((call) => call.arguments[0]);
    assert.ok(lines.includes('OK       electricity/-/NSW = 0.79'));
    assert.ok(lines.includes('MISSING  electricity/-/QLD'));
  });
});
