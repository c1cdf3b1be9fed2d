import { z } from 'zod';
import { DatabaseConnectionManager } from '../config/connection';
import { ProblemExampleSchema, ProblemTestCaseSchema } from '../catalog/catalog-loader';
import { DIFFICULTIES, Difficulty, DifficultyPreference, NewProblem, Problem, isDifficulty } from '../types';
import { CatalogUpsertResult, ProblemCatalog, ProblemCatalogLoader } from '../types/repository';
import { Logger, createModuleLogger } from '../../system/logging/logger';
import { toErrorMessage } from '../../system/error-handling';

interface ProblemRow {
  identity: string;
  title: string;
  description: string;
  difficulty: string;
  tags: string;
  constraints: string;
  examples: string;
  hints: string;
  test_cases: string;
  created_at: string;
}

const StringListSchema = z.array(z.string());

/**
 * Problem catalog backed by the `problems` table
 */
export class ProblemRepository implements ProblemCatalog, ProblemCatalogLoader {
  private logger: Logger;

  constructor(private readonly connection: DatabaseConnectionManager, logger?: Logger) {
    this.logger = logger ?? createModuleLogger('db.problems');
  }

  /**
   * Find a problem by identity
   */
  public async findById(identity: string): Promise<Problem | null> {
    const db = await this.connection.getConnection();
    const row = await db.get<ProblemRow>(`SELECT * FROM problems WHERE identity = ?`, identity);
    return row ? this.mapToProblem(row) : null;
  }

  /**
   * Problems of one difficulty, or every problem for `any`
   */
  public async listByDifficulty(difficulty: DifficultyPreference): Promise<Problem[]> {
    const db = await this.connection.getConnection();
    const rows = difficulty === 'any'
      ? await db.all<ProblemRow[]>(`SELECT * FROM problems ORDER BY identity`)
      : await db.all<ProblemRow[]>(`SELECT * FROM problems WHERE difficulty = ? ORDER BY identity`, difficulty);
    return rows.map(row => this.mapToProblem(row));
  }

  public async count(): Promise<number> {
    const db = await this.connection.getConnection();
    const result = await db.get<{ count: number }>(`SELECT COUNT(*) as count FROM problems`);
    return result?.count ?? 0;
  }

  public async countByDifficulty(): Promise<Record<Difficulty, number>> {
    const db = await this.connection.getConnection();
    const rows = await db.all<{ difficulty: string; count: number }[]>(
      `SELECT difficulty, COUNT(*) as count FROM problems GROUP BY difficulty`
    );

    const counts: Record<Difficulty, number> = { easy: 0, medium: 0, hard: 0 };
    for (const row of rows) {
      if (isDifficulty(row.difficulty)) {
        counts[row.difficulty] = row.count;
      }
    }
    return counts;
  }

  /**
   * Insert new problems and overwrite existing ones, keyed by identity
   */
  public async upsertMany(problems: NewProblem[]): Promise<CatalogUpsertResult> {
    const result = await this.connection.withTransaction(async db => {
      let inserted = 0;
      let updated = 0;

      for (const problem of problems) {
        const columns = [
          problem.title,
          problem.description,
          problem.difficulty,
          JSON.stringify(problem.tags),
          JSON.stringify(problem.constraints),
          JSON.stringify(problem.examples),
          JSON.stringify(problem.hints),
          JSON.stringify(problem.test_cases)
        ];

        const existing = await db.get<{ identity: string }>(
          `SELECT identity FROM problems WHERE identity = ?`,
          problem.identity
        );

        if (existing) {
          await db.run(
            `UPDATE problems
             SET title = ?, description = ?, difficulty = ?, tags = ?, constraints = ?,
                 examples = ?, hints = ?, test_cases = ?
             WHERE identity = ?`,
            ...columns,
            problem.identity
          );
          updated++;
        } else {
          await db.run(
            `INSERT INTO problems
             (identity, title, description, difficulty, tags, constraints, examples, hints, test_cases, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            problem.identity,
            ...columns,
            new Date().toISOString()
          );
          inserted++;
        }
      }

      return { inserted, updated };
    });

    const total = await this.count();
    this.logger.info('Catalog loaded', { ...result, total }, 'upsertMany');
    return { ...result, total };
  }

  public async healthCheck(): Promise<boolean> {
    try {
      await this.count();
      return true;
    } catch (error) {
      this.logger.warn('Problem catalog health check failed', { error: toErrorMessage(error) }, 'healthCheck');
      return false;
    }
  }

  private mapToProblem(row: ProblemRow): Problem {
    if (!isDifficulty(row.difficulty)) {
      throw new Error(`Problem ${row.identity} has unknown difficulty "${row.difficulty}"; expected one of ${DIFFICULTIES.join(', ')}`);
    }

    return {
      identity: row.identity,
      title: row.title,
      description: row.description,
      difficulty: row.difficulty,
      tags: parseJsonColumn(row, 'tags', StringListSchema),
      constraints: parseJsonColumn(row, 'constraints', StringListSchema),
      examples: parseJsonColumn(row, 'examples', z.array(ProblemExampleSchema)),
      hints: parseJsonColumn(row, 'hints', StringListSchema),
      test_cases: parseJsonColumn(row, 'test_cases', z.array(ProblemTestCaseSchema)),
      created_at: new Date(row.created_at)
    };
  }
}

type JsonColumn = 'tags' | 'constraints' | 'examples' | 'hints' | 'test_cases';

function parseJsonColumn<T>(row: ProblemRow, column: JsonColumn, schema: z.ZodType<T>): T {
  let value: unknown;
  try {
    value = JSON.parse(row[column]);
  } catch {
    throw new Error(`Problem ${row.identity} has malformed ${column} JSON`);
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Problem ${row.identity} has invalid ${column}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}
