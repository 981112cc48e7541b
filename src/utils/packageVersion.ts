import fs from 'fs';
import path from 'path';

let cached: string | undefined;

/** Version from the nearest package.json (cwd first, then relative to the compiled output). */
export function packageVersion(): string {
  if(cached) return cached;
  const candidates = [
    path.join(process.cwd(), 'package.json'),
    path.join(__dirname, '..', '..', 'package.json'),
  ];
  for(const p of candidates){
    if(!fs.existsSync(p)) continue;
    const raw: unknown = JSON.parse(fs.readFileSync(p, 'utf8'));
    if(raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string'){
      cached = raw.version;
      return cached;
    }
  }
  cached = '0.0.0';
  return cached;
}
