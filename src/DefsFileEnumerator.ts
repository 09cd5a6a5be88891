import { VersionResolver } from './VersionResolver.js';
import { findChildDirectory, walkXmlFiles } from './fsEntries.js';
import { Logger, defaultLogger } from './logger.js';

/**
 * Lists the XML files that make up a mod's definitions: the root-level `Defs` tree plus
 * the `Defs` tree of the single version folder chosen by the resolver.
 */
export class DefsFileEnumerator {
    private versionResolver: VersionResolver;
    private logger: Logger;

    constructor(versionResolver: VersionResolver, logger: Logger = defaultLogger) {
        this.versionResolver = versionResolver;
        this.logger = logger;
    }

    async *enumerate(modRoot: string): AsyncGenerator<string> {
        const rootDefs = await findChildDirectory(modRoot, 'Defs', this.logger);
        if (rootDefs) {
            yield* walkXmlFiles(rootDefs, this.logger);
        }

        const versionDir = await this.versionResolver.resolve(modRoot);
        if (versionDir) {
            const versionDefs = await findChildDirectory(versionDir, 'Defs', this.logger);
            if (versionDefs) {
                yield* walkXmlFiles(versionDefs, this.logger);
            }
        }
    }
}
