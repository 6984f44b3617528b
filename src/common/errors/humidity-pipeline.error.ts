/**
 * Base class for errors that must stop the humidity pipeline instead of
 * degrading to unknown values or the demo dataset.
 */
export class HumidityPipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Reference data or environment is unusable (missing municipality file,
 * spreadsheet without coordinate columns).
 */
export class PipelineConfigurationError extends HumidityPipelineError {}

/**
 * A collected table does not carry the columns the dataset schema requires.
 */
export class PipelineContractError extends HumidityPipelineError {
  constructor(readonly missingColumns: string[]) {
    super(`Humidity pipeline is missing columns: ${missingColumns.join(", ")}`);
  }
}
