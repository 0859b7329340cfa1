#!/usr/bin/env -S node --import tsx

import Draw from './commands/draw'

await Draw.run(process.argv.slice(2), import.meta.url)
