import { ContainerReader, ContainerWriter, renderBuildSummary, renderDependencyTree, renderExtractionReport } from "./src";
import * as Fs from 'fs';
import * as Os from 'os';
import * as Path from 'path';

async function test() {
    let workDir = await Fs.promises.mkdtemp(Path.join(Os.tmpdir(), 'blobpack-example-'));
    let blobPath = Path.join(workDir, 'apps.blob');

    // pack this repository's sources twice, one depending on the other
    console.log('Building container...');
    let writer = new ContainerWriter(blobPath, 'application');
    await writer.addEntry('sources', Path.resolve('./src'), { name: 'Sources', dependencies: ['helpers'] });
    await writer.addEntry('helpers', Path.resolve('./test'), { name: 'Test helpers' });
    console.log(renderBuildSummary(await writer.build()));

    //:: READ IT BACK!

    console.log('Reading container...');
    let reader = await ContainerReader.open(blobPath, 'application');
    console.log(renderDependencyTree(reader.dependencyTree('sources')));

    let report = await reader.extractMany(['sources'], Path.join(workDir, 'extracted'));
    console.log(renderExtractionReport(report));
    console.log(`Output left in ${workDir}`);
}

test().catch(console.error);
