import * as fs from 'fs';
import * as path from 'path';

import Handlebars from 'handlebars';

export interface ArtifactContext {
  name: string;
  nodeVersion: string;
  branch: string;
  backendPort: number;
  region: string;
  repository: string;
  ecs?: {
    cluster: string;
    service: string;
  };
}

export interface GeneratedFile {
  path: string;
  contents: string;
}

const templatesRoot = path.resolve(__dirname, '..', 'templates');

// output path -> template file under templates/
const artifactTemplates: ReadonlyArray<readonly [string, string]> = [
  ['Dockerfile', 'Dockerfile.hbs'],
  ['.dockerignore', 'dockerignore.hbs'],
  ['.github/workflows/deploy.yml', 'github/workflows/deploy.yml.hbs'],
  ['backend/package.json', 'backend/package.json.hbs'],
  ['backend/server.js', 'backend/server.js.hbs'],
  ['frontend/package.json', 'frontend/package.json.hbs'],
  ['frontend/public/index.html', 'frontend/public/index.html.hbs'],
  ['frontend/src/index.js', 'frontend/src/index.js.hbs'],
  ['frontend/src/App.js', 'frontend/src/App.js.hbs'],
  ['frontend/src/App.test.js', 'frontend/src/App.test.js.hbs'],
];

const handlebars = Handlebars.create();

// GitHub Actions expressions share the mustache delimiters
handlebars.registerHelper('gha', (expression: string) => '${{ ' + expression + ' }}');

const compiled = new Map<string, (context: ArtifactContext) => string>();

const loadTemplate = (file: string) => {
  let template = compiled.get(file);
  if (!template) {
    const source = fs.readFileSync(path.join(templatesRoot, file), 'utf8');
    template = handlebars.compile<ArtifactContext>(source, { noEscape: true });
    compiled.set(file, template);
  }
  return template;
};

export const artifactPaths = () => artifactTemplates.map(([output]) => output);

export const renderArtifacts = (context: ArtifactContext): GeneratedFile[] =>
  artifactTemplates.map(([output, file]) => ({
    path: output,
    contents: loadTemplate(file)(context),
  }));
