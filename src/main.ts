import { loadCoefficientTables, DEFAULT_DATA_DIR } from './model/coefficients'
import { TaperError } from './model/errors'
import { run } from './cli'

loadCoefficientTables(process.env.STEM_TAPER_DATA_DIR ?? DEFAULT_DATA_DIR)
  .then(tables => {
    const result = run(process.argv.slice(2), tables)
    if (!result.ok) {
      console.error(result.message)
      process.exitCode = 1
      return
    }
    for (const line of result.lines) console.log(line)
  })
  .catch((err: unknown) => {
    console.error(err instanceof TaperError ? `${err.code}: ${err.message}` : err)
    process.exitCode = 1
  })
