import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { access, readFile } from 'node:fs/promises';
import path from 'node:path';
import { EntityManager, EntityTarget } from 'typeorm';
import { ValidationError } from '../common/errors';
import { UnitOfWork } from '../common/unit-of-work';
import { assertValidName, assertValidSlug, assertValidYear } from '../catalog/catalog-rules';
import { SlugEntry } from '../catalog/slug-dictionary.service';
import {
  Category,
  Comment,
  Genre,
  Review,
  Title,
  User,
} from '../database/entities';
import { isStoredRole } from '../policy/roles';
import { RatingService } from '../reviews/rating.service';
import { assertValidScore, assertValidText } from '../reviews/review-rules';
import { assertValidEmail, assertValidUsername } from '../users/identity-rules';

export const IMPORT_FILES = [
  'category.csv',
  'genre.csv',
  'titles.csv',
  'genre_title.csv',
  'users.csv',
  'review.csv',
  'comments.csv',
] as const;

export type ImportFile = (typeof IMPORT_FILES)[number];

type CsvRow = Record<string, string>;

export interface FileReport {
  file: ImportFile;
  present: boolean;
  imported: number;
  skipped: number;
}

export interface ImportReport {
  files: FileReport[];
  /** titles whose rating was recomputed after review rows went in */
  ratedTitles: number[];
}

type RowOutcome = 'imported' | 'skipped';

interface ImportRun {
  manager: EntityManager;
  touchedTitles: Set<number>;
}

const SEQUENCE_TABLES = ['categories', 'genres', 'titles', 'users', 'reviews', 'comments'];

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((field) => typeof field === 'string')
  );
}

function parseId(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return null;
  }
  const id = Number(value);
  return id > 0 ? id : null;
}

function parseTimestamp(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/** True when every check passes; rule violations count as a bad row. */
function passes(...checks: Array<() => void>): boolean {
  try {
    checks.forEach((check) => check());
    return true;
  } catch (error) {
    if (error instanceof ValidationError) {
      return false;
    }
    throw error;
  }
}

/**
 * Loads a directory of CSV exports into the database. Ids in the files are
 * kept, rows whose id already exists are left alone, so running the import
 * twice changes nothing.
 */
@Injectable()
export class ImportService {
  private readonly logger = new Logger(ImportService.name);

  private readonly processors: Record<
    ImportFile,
    (run: ImportRun, row: CsvRow) => Promise<RowOutcome>
  > = {
    'category.csv': (run, row) => this.importSlugEntry(run.manager, Category, row),
    'genre.csv': (run, row) => this.importSlugEntry(run.manager, Genre, row),
    'titles.csv': (run, row) => this.importTitle(run.manager, row),
    'genre_title.csv': (run, row) => this.importGenreLink(run.manager, row),
    'users.csv': (run, row) => this.importUser(run.manager, row),
    'review.csv': (run, row) => this.importReview(run, row),
    'comments.csv': (run, row) => this.importComment(run.manager, row),
  };

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly rating: RatingService,
  ) {}

  async importDirectory(directory: string): Promise<ImportReport> {
    this.logger.log(`Importing CSV files from ${directory}`);
    const sources = await Promise.all(
      IMPORT_FILES.map(async (file) => ({
        file,
        rows: await this.readRows(path.join(directory, file)),
      })),
    );

    const report = await this.unitOfWork.run(async (manager) => {
      const run: ImportRun = { manager, touchedTitles: new Set() };
      const files: FileReport[] = [];

      for (const { file, rows } of sources) {
        if (rows === null) {
          this.logger.warn(`${file} not found, skipping`);
          files.push({ file, present: false, imported: 0, skipped: 0 });
          continue;
        }
        const entry: FileReport = { file, present: true, imported: 0, skipped: 0 };
        for (const row of rows) {
          entry[await this.processors[file](run, row)] += 1;
        }
        this.logger.log(`${file}: ${entry.imported} imported, ${entry.skipped} skipped`);
        files.push(entry);
      }

      const ratedTitles = [...run.touchedTitles].sort((a, b) => a - b);
      for (const titleId of ratedTitles) {
        await this.rating.recompute(manager, titleId);
      }
      await this.advanceSequences(manager);
      return { files, ratedTitles };
    });

    this.logger.log('Import finished');
    return report;
  }

  private async readRows(file: string): Promise<CsvRow[] | null> {
    try {
      await access(file);
    } catch {
      return null;
    }
    const records: unknown = parse(await readFile(file, 'utf8'), {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
    if (!Array.isArray(records) || !records.every(isCsvRow)) {
      throw new ValidationError(`${path.basename(file)} is not a CSV table`);
    }
    return records;
  }

  private async importSlugEntry(
    manager: EntityManager,
    target: EntityTarget<SlugEntry>,
    row: CsvRow,
  ): Promise<RowOutcome> {
    const id = parseId(row.id);
    const { name = '', slug = '' } = row;
    if (id === null || !passes(() => assertValidName(name), () => assertValidSlug(slug))) {
      return 'skipped';
    }
    if (await manager.exists(target, { where: [{ id }, { name }, { slug }] })) {
      return 'skipped';
    }
    await manager.insert(target, { id, name, slug });
    return 'imported';
  }

  private async importTitle(manager: EntityManager, row: CsvRow): Promise<RowOutcome> {
    const id = parseId(row.id);
    const { name = '' } = row;
    const year = Number(row.year);
    if (id === null || !passes(() => assertValidName(name), () => assertValidYear(year))) {
      return 'skipped';
    }
    if (await manager.exists(Title, { where: { id } })) {
      return 'skipped';
    }

    let categoryId: number | null = null;
    if (row.category) {
      categoryId = parseId(row.category);
      if (categoryId === null || !(await manager.exists(Category, { where: { id: categoryId } }))) {
        return 'skipped';
      }
    }

    await manager.insert(Title, {
      id,
      name,
      year,
      description: row.description || null,
      category: categoryId === null ? null : { id: categoryId },
      rating: null,
    });
    return 'imported';
  }

  private async importGenreLink(manager: EntityManager, row: CsvRow): Promise<RowOutcome> {
    const titleId = parseId(row.title_id);
    const genreId = parseId(row.genre_id);
    if (titleId === null || genreId === null) {
      return 'skipped';
    }
    const [titleExists, genreExists, linked] = await Promise.all([
      manager.exists(Title, { where: { id: titleId } }),
      manager.exists(Genre, { where: { id: genreId } }),
      manager
        .createQueryBuilder()
        .select('tg.title_id')
        .from('title_genres', 'tg')
        .where('tg.title_id = :titleId AND tg.genre_id = :genreId', { titleId, genreId })
        .getRawOne<{ title_id: number }>(),
    ]);
    if (!titleExists || !genreExists || linked !== undefined) {
      return 'skipped';
    }
    await manager.createQueryBuilder().relation(Title, 'genres').of(titleId).add(genreId);
    return 'imported';
  }

  private async importUser(manager: EntityManager, row: CsvRow): Promise<RowOutcome> {
    const id = parseId(row.id);
    const { username = '', email = '' } = row;
    const role = row.role || 'user';
    if (
      id === null ||
      !isStoredRole(role) ||
      !passes(() => assertValidUsername(username), () => assertValidEmail(email))
    ) {
      return 'skipped';
    }
    if (await manager.exists(User, { where: [{ id }, { username }, { email }] })) {
      return 'skipped';
    }
    await manager.insert(User, {
      id,
      username,
      email,
      role,
      firstName: row.first_name ?? '',
      lastName: row.last_name ?? '',
      bio: row.bio ?? '',
      confirmationCode: null,
      confirmationCodeExpiresAt: null,
    });
    return 'imported';
  }

  private async importReview(run: ImportRun, row: CsvRow): Promise<RowOutcome> {
    const { manager } = run;
    const id = parseId(row.id);
    const titleId = parseId(row.title_id);
    const authorId = parseId(row.author);
    const score = Number(row.score);
    const text = row.text ?? '';
    if (
      id === null ||
      titleId === null ||
      authorId === null ||
      !passes(() => assertValidScore(score), () => assertValidText(text))
    ) {
      return 'skipped';
    }

    const [reviewExists, titleExists, authorExists, pairTaken] = await Promise.all([
      manager.exists(Review, { where: { id } }),
      manager.exists(Title, { where: { id: titleId } }),
      manager.exists(User, { where: { id: authorId } }),
      manager.exists(Review, {
        where: { title: { id: titleId }, author: { id: authorId } },
      }),
    ]);
    if (reviewExists || !titleExists || !authorExists || pairTaken) {
      return 'skipped';
    }

    await manager.insert(Review, {
      id,
      title: { id: titleId },
      author: { id: authorId },
      text,
      score,
      createdAt: parseTimestamp(row.pub_date),
    });
    run.touchedTitles.add(titleId);
    return 'imported';
  }

  private async importComment(manager: EntityManager, row: CsvRow): Promise<RowOutcome> {
    const id = parseId(row.id);
    const reviewId = parseId(row.review_id);
    const authorId = parseId(row.author);
    const text = row.text ?? '';
    if (id === null || reviewId === null || authorId === null || !passes(() => assertValidText(text))) {
      return 'skipped';
    }

    const [commentExists, reviewExists, authorExists] = await Promise.all([
      manager.exists(Comment, { where: { id } }),
      manager.exists(Review, { where: { id: reviewId } }),
      manager.exists(User, { where: { id: authorId } }),
    ]);
    if (commentExists || !reviewExists || !authorExists) {
      return 'skipped';
    }

    await manager.insert(Comment, {
      id,
      review: { id: reviewId },
      author: { id: authorId },
      text,
      createdAt: parseTimestamp(row.pub_date),
    });
    return 'imported';
  }

  // explicit ids bypass the serial sequences, which would otherwise hand
  // out ids that are already taken
  private async advanceSequences(manager: EntityManager): Promise<void> {
    if (manager.connection.options.type !== 'postgres') {
      return;
    }
    for (const table of SEQUENCE_TABLES) {
      await manager.query(
        `SELECT setval(pg_get_serial_sequence('${table}', 'id'), COALESCE(MAX(id), 1)) FROM ${table}`,
      );
    }
  }
}
