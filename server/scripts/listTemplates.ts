/**
 * List Prompt Templates
 *
 * Prints every template in the registry with its versions, or the full
 * content of one version.
 *
 * Usage:
 *   tsx server/scripts/listTemplates.ts
 *   tsx server/scripts/listTemplates.ts <TEMPLATE_NAME> [VERSION]
 */

import { loadSettings } from "../config/settings";
import { loadTemplateRegistry } from "../analysis/prompts/registry";
import { getErrorMessage } from "../utils/errorHandler";

const args = process.argv.slice(2);

try {
    const settings = loadSettings();
    const registry = loadTemplateRegistry(settings.templatesPath);

    if (args.length === 0) {
        console.log("\n📚 Prompt Templates");
        console.log("=".repeat(50));
        for (const template of registry.listTemplates()) {
            const marker = template.name === settings.defaultTemplate ? " (default)" : "";
            console.log(`\n${template.name}${marker}`);
            console.log(`  ${template.description}`);
            console.log(`  Format: ${template.format}, scope: ${template.scope}`);
            console.log(`  Versions: ${template.versions.map(v => v === template.latestVersion ? `${v}*` : v).join(", ")}`);
        }
        console.log("\n* latest version");
        console.log("");
    } else {
        const [name, version] = args;
        const resolved = registry.resolve(name, version);
        console.log(`\n📝 ${resolved.name} v${resolved.version}`);
        console.log("=".repeat(50));
        console.log(`Description: ${resolved.description}`);
        console.log(`Format: ${resolved.format}, scope: ${resolved.scope}`);
        console.log("-".repeat(50));
        console.log(resolved.content);
        console.log("");
    }
} catch (error) {
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exit(1);
}
