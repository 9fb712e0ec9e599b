export { initCommand } from './init.js';
export { pagesCommand } from './pages.js';
export { publishCommand } from './publish.js';
export { previewCommand } from './preview.js';
export { catalogCommand } from './catalog.js';
export { serveCommand } from './serve.js';
