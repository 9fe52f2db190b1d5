/**
 * Risk Gate — Help Text
 */

import { DEFAULT_NOISE_THRESHOLD } from '../../../engine/pattern-matcher.ts';
import {
  DEFAULT_DIFF_REF,
  DEFAULT_ORACLE_TIMEOUT_SECONDS,
  DEFAULT_TEMPLATE_GLOB,
} from '../../input/args.ts';

const HELP_MESSAGE = `
whatif-gate — confidence-gated risk review for What-If output

USAGE:
  az deployment group what-if ... | whatif-gate [OPTIONS]

ORACLE:
  --oracle-command <cmd>        Command that classifies a request read from stdin
                                (env: WHATIF_ORACLE_COMMAND)
  --oracle-url <url>            HTTP endpoint that classifies a POSTed request
                                (env: WHATIF_ORACLE_URL)
  --oracle-response-field <f>   JSON field holding the classification text (HTTP only)
  --oracle-timeout <seconds>    Budget per oracle call (default: [TIMEOUT])
  --model <id>                  Model forwarded to the oracle (env: WHATIF_MODEL)

OUTPUT:
  -f, --format <json|markdown>  Report format on stdout (default: json)
  --title <text>                Markdown report heading

CONTEXT:
  --ci                          Collect the git diff even outside a detected CI platform
  --diff <file>                 Read the code diff from a file instead of git
  --diff-ref <ref>              Git ref to diff against (default: [DIFF_REF];
                                the PR base branch on a detected platform)
  --template-dir <dir>          Forward template sources found under <dir>
  --template-glob <glob>        Template file pattern (default: [GLOB])
  --pr-title <text>             Pull request title for the intent check
  --pr-description <text>       Pull request description for the intent check

GATING:
  --drift-threshold <level>     low | medium | high (default: high)
  --intent-threshold <level>    low | medium | high (default: high)
  --operations-threshold <lvl>  low | medium | high (default: high)
  --noise-file <file>           Known-noise phrases, one per line (repeatable)
  --noise-threshold <ratio>     Similarity needed to match a phrase (default: [NOISE])

DIAGNOSTICS:
  --log-dir <dir>               Write whatif-gate.log and telemetry.json here
  --structured-logs             Emit JSON log lines
  -v, --verbose                 Include debug lines on stderr
  -h, --help                    Show this help message
  --version                     Show version number

EXIT STATUS:
  0  deployment is safe
  1  deployment is unsafe, or the evaluation failed
  2  invalid arguments or input
`;

/**
 * Build the help message with the current defaults filled in.
 */
export function showHelp(): string {
  return HELP_MESSAGE.replace('[TIMEOUT]', String(DEFAULT_ORACLE_TIMEOUT_SECONDS))
    .replace('[DIFF_REF]', DEFAULT_DIFF_REF)
    .replace('[GLOB]', DEFAULT_TEMPLATE_GLOB)
    .replace('[NOISE]', String(DEFAULT_NOISE_THRESHOLD));
}
