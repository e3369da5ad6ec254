import { logger } from '../logging/logger.js';

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: () => boolean; message: string }
    | { type: 'assert'; check: () => boolean; message: string };

/**
 * Collects configuration violations and returns them as messages.
 */
export function checkRules(rules: readonly GuardRule[]): string[] {
    const errors: string[] = [];

    for (const rule of rules) {
        try {
            switch (rule.type) {
                case 'required': {
                    const value = process.env[rule.name];
                    if (!value || value.trim() === '') {
                        errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                    }
                    break;
                }

                case 'forbidIf': {
                    if (rule.when()) {
                        errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                    }
                    break;
                }

                case 'assert': {
                    if (!rule.check()) {
                        errors.push(`FATAL CONFIG: ${rule.message}`);
                    }
                    break;
                }
            }
        } catch (err: unknown) {
            errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    return errors;
}

/**
 * Fail-closed startup configuration guard.
 * Runs only at bootstrap; a violation stops the process before it serves
 * any request.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[]) {
        const errors = checkRules(rules);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables. No defaults allowed."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
