import fs from 'fs';
import path from 'path';
import { swaggerSpec } from '../src/swagger/swagger.config';

/**
 * Write the OpenAPI document to dist/openapi.json for API clients
 */
const outputPath = path.join(__dirname, '../dist/openapi.json');

fs.mkdirSync(path.dirname(outputPath), { recursive: true });
fs.writeFileSync(outputPath, JSON.stringify(swaggerSpec, null, 2));

const paths = 'paths' in swaggerSpec && typeof swaggerSpec.paths === 'object' ? swaggerSpec.paths : {};
console.log(`✅ OpenAPI spec generated: ${outputPath}`);
console.log(`   Endpoints found: ${Object.keys(paths ?? {}).length}`);
