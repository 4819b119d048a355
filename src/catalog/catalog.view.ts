import { Title } from '../database/entities';

export interface SlugEntryView {
  name: string;
  slug: string;
}

export interface TitleView {
  id: number;
  name: string;
  year: number;
  description: string | null;
  rating: number | null;
  category: SlugEntryView | null;
  genres: SlugEntryView[];
}

export function toSlugEntryView(entry: SlugEntryView): SlugEntryView {
  return { name: entry.name, slug: entry.slug };
}

export function toTitleView(title: Title): TitleView {
  return {
    id: title.id,
    name: title.name,
    year: title.year,
    description: title.description,
    rating: title.rating,
    category: title.category ? toSlugEntryView(title.category) : null,
    genres: (title.genres ?? [])
      .map(toSlugEntryView)
      .sort((a, b) => a.name.localeCompare(b.name)),
  };
}
