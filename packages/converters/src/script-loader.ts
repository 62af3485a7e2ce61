/**
 * Client-side script loading for the component renderers, which cannot
 * place `<script>` tags in their markup.
 */

import type { ManifestImports } from '@pageforge/types';

export interface ScriptLoader {
    /** Statements that inject the scripts */
    setup: string[];
    /** Statements that remove them again */
    cleanup: string[];
}

/**
 * Builds JavaScript statements that append the manifest's external and
 * inline scripts to `document.body`. Both arrays are empty when there is
 * nothing to load.
 *
 * @param owner - Object the injected elements are stored on (e.g. `this`)
 *   when setup and cleanup run in different functions; local constants
 *   otherwise
 */
export function scriptLoader(
    imports: ManifestImports,
    owner?: string,
): ScriptLoader {
    const setup: string[] = [];
    const cleanup: string[] = [];
    const ref = (name: string) =>
        owner === undefined ? name : `${owner}.${name}`;
    const declare = (name: string) =>
        owner === undefined ? `const ${name}` : ref(name);

    const sources = imports.scripts ?? [];
    if (sources.length > 0) {
        setup.push(
            `${declare('scripts')} = ${JSON.stringify(sources)}.map((src) => {`,
            "  const script = document.createElement('script');",
            '  script.src = src;',
            '  script.async = true;',
            '  document.body.appendChild(script);',
            '  return script;',
            '});',
        );
        cleanup.push(`${ref('scripts')}.forEach((script) => script.remove());`);
    }

    const inline = imports.inline_scripts?.trim();
    if (inline) {
        setup.push(
            `${declare('inlineScript')} = document.createElement('script');`,
            `${ref('inlineScript')}.textContent = ${JSON.stringify(inline)};`,
            `document.body.appendChild(${ref('inlineScript')});`,
        );
        cleanup.push(`${ref('inlineScript')}.remove();`);
    }

    return { setup, cleanup };
}
