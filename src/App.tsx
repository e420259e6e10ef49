import { useCallback, useEffect, useMemo, useState, type ChangeEvent, type ReactNode } from "react";
import { Bar, BarChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";
import { Analytics } from "@vercel/analytics/react";
import { SpeedInsights } from "@vercel/speed-insights/react";
import {
  ApiError,
  booksCsvUrl,
  fetchBookDetail,
  fetchBooks,
  fetchFacets,
  type BookDetailResponse,
  type BooksResponse,
  type FacetsResponse,
} from "./api";
import { READING_LIST_FILE_NAME, readingListCsv } from "./lib/export";
import {
  DEFAULT_FILTER_STATE,
  DEFAULT_REVIEW_SETTINGS,
  fieldHint,
  toFilterParams,
  type FilterState,
} from "./lib/filterState";
import { ERA_PRESETS, LENGTH_PRESETS } from "./lib/filters";
import { logDebug } from "./lib/log";
import { MAX_LIMIT } from "./lib/recommend";
import { truncateText } from "./lib/reviews";
import type { RatingBucket } from "./lib/stats";
import type { Range, Work } from "./lib/types";
import "./App.css";

const DESCRIPTION_PREVIEW_LENGTH = 300;

const formatCount = (value: number | null) => (value == null ? "0" : value.toLocaleString());
const formatYear = (value: number | null) => (value == null ? "Unknown" : String(Math.trunc(value)));

const downloadText = (text: string, fileName: string) => {
  const blob = new Blob([text], { type: "text/csv;charset=utf-8;" });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
};

const selectedOptions = (e: ChangeEvent<HTMLSelectElement>) =>
  Array.from(e.target.selectedOptions, (option) => option.value);

const Section = ({
  title,
  hint,
  children,
}: {
  title: string;
  hint?: string;
  children: ReactNode;
}) => (
  <div className="rl-section">
    <h3 className="rl-section-title" title={hint}>
      {title}
    </h3>
    {children}
  </div>
);

const Metrics = ({ stats }: { stats: FacetsResponse["stats"] }) => (
  <div className="rl-metrics">
    <div className="rl-metric">
      <div className="rl-metric-value">{stats.totalBooks.toLocaleString()}</div>
      <div className="rl-metric-label">Total books</div>
    </div>
    <div className="rl-metric">
      <div className="rl-metric-value">{stats.totalReviews.toLocaleString()}</div>
      <div className="rl-metric-label">Total reviews</div>
    </div>
    <div className="rl-metric">
      <div className="rl-metric-value">
        {stats.averageRating == null ? "–" : stats.averageRating.toFixed(2)}
      </div>
      <div className="rl-metric-label">Avg rating</div>
    </div>
    <div className="rl-metric">
      <div className="rl-metric-value">{stats.uniqueAuthors.toLocaleString()}</div>
      <div className="rl-metric-label">Authors</div>
    </div>
  </div>
);

const RatingChart = ({ buckets }: { buckets: RatingBucket[] }) => (
  <div style={{ width: "100%", height: 160 }}>
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={buckets} margin={{ top: 10, right: 10, left: 0, bottom: 10 }}>
        <XAxis
          dataKey="label"
          tick={{ fontSize: 11, fill: "#8b5c2a" }}
          tickLine={false}
          axisLine={{ stroke: "#c9a97a" }}
        />
        <YAxis allowDecimals={false} tick={{ fontSize: 10, fill: "#8b5c2a" }} tickLine={false} axisLine={false} width={30} />
        <Tooltip cursor={{ fill: "rgba(139, 92, 42, 0.12)" }} />
        <Bar dataKey="count" name="Books" fill="#b5733a" radius={[3, 3, 0, 0]} isAnimationActive={false} />
      </BarChart>
    </ResponsiveContainer>
  </div>
);

const RangeInputs = ({
  value,
  bounds,
  onChange,
}: {
  value: Range;
  bounds: Range;
  onChange: (next: Range) => void;
}) => {
  const update = (index: 0 | 1) => (e: ChangeEvent<HTMLInputElement>) => {
    const parsed = Number(e.target.value);
    if (!Number.isFinite(parsed)) return;
    const next: Range = index === 0 ? [parsed, value[1]] : [value[0], parsed];
    if (next[0] <= next[1]) onChange(next);
  };
  return (
    <div className="rl-range">
      <input type="number" min={bounds[0]} max={bounds[1]} value={value[0]} onChange={update(0)} />
      <span>to</span>
      <input type="number" min={bounds[0]} max={bounds[1]} value={value[1]} onChange={update(1)} />
    </div>
  );
};

const BookCard = ({ work, hideSpoilers }: { work: Work; hideSpoilers: boolean }) => {
  const [detail, setDetail] = useState<BookDetailResponse | null>(null);
  const [detailError, setDetailError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    setDetailError(null);
    fetchBookDetail(work.id, !hideSpoilers)
      .then((next) => {
        if (!cancelled) setDetail(next);
      })
      .catch((err: unknown) => {
        if (!cancelled) setDetailError(err instanceof Error ? err.message : "Failed to load reviews");
      });
    return () => {
      cancelled = true;
    };
  }, [work.id, hideSpoilers]);

  return (
    <article className="rl-book">
      <header>
        <h2 className="rl-book-title">{work.title}</h2>
        <div className="rl-book-author">by {work.author || "Unknown author"}</div>
      </header>

      <div className="rl-book-body">
        {work.imageUrl ? (
          <img className="rl-cover" src={work.imageUrl} alt={`Cover of ${work.title}`} width={120} />
        ) : (
          <div className="rl-cover rl-cover-empty">No cover</div>
        )}
        <dl className="rl-book-meta">
          <dt>Genres</dt>
          <dd>{work.genres.join(", ") || "–"}</dd>
          <dt>Rating</dt>
          <dd>
            {work.averageRating ?? "–"}/5.0 ({formatCount(work.ratingsCount)} ratings)
          </dd>
          <dt>Published</dt>
          <dd>{formatYear(work.publicationYear)}</dd>
          <dt>Pages</dt>
          <dd>{work.pageCount == null ? "Unknown" : work.pageCount}</dd>
          <dt>Description</dt>
          <dd>
            {work.description
              ? truncateText(work.description, DESCRIPTION_PREVIEW_LENGTH)
              : <em>No description available</em>}
          </dd>
        </dl>
      </div>

      <h4 className="rl-reviews-title">Reader reviews</h4>
      {detailError && <p className="rl-error">{detailError}</p>}
      {!detailError && !detail && <p className="rl-muted">Loading reviews...</p>}
      {detail && detail.reviews.length === 0 && <p className="rl-muted">No reviews available for this book.</p>}
      {detail && detail.reviews.length > 0 && (
        <>
          <p className="rl-muted">
            Showing {detail.reviews.length} of {detail.reviewCount} reviews
          </p>
          {detail.reviews.map((review, index) => (
            <blockquote key={index} className="rl-review">
              <p>{review.text || "No review text available."}</p>
              <footer>
                {review.rating ?? "–"}/5
                {review.votes ? ` · ${review.votes} helpful votes` : ""}
              </footer>
            </blockquote>
          ))}
        </>
      )}

      {detail && detail.similar.length > 0 && (
        <details className="rl-similar">
          <summary>Show similar books</summary>
          <ul>
            {detail.similar.map((similar) => (
              <li key={similar.id}>
                <strong>{similar.title}</strong> by <em>{similar.author}</em> (
                {similar.publicationYear == null ? "N/A" : Math.trunc(similar.publicationYear)})
              </li>
            ))}
          </ul>
        </details>
      )}
    </article>
  );
};

function App() {
  const [facets, setFacets] = useState<FacetsResponse | null>(null);
  const [filters, setFilters] = useState<FilterState>(DEFAULT_FILTER_STATE);
  const [reviewSettings, setReviewSettings] = useState(DEFAULT_REVIEW_SETTINGS);
  // 0 = ranked results; each Surprise Me click bumps it to draw again
  const [surpriseRound, setSurpriseRound] = useState(0);
  const [results, setResults] = useState<BooksResponse | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [fatalError, setFatalError] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    fetchFacets()
      .then((next) => {
        logDebug("Facets:", next.genres.length, "genres,", next.authors.length, "authors");
        setFacets(next);
      })
      .catch((err: unknown) => {
        setFatalError(err instanceof Error ? err.message : "Failed to load book data");
      });
  }, []);

  const bounds = useMemo(
    () => ({
      years: facets?.yearBounds ?? ([-500, 2023] satisfies Range),
      pages: facets?.pageBounds ?? ([1, 2000] satisfies Range),
    }),
    [facets]
  );

  const params = useMemo(() => toFilterParams(filters, bounds), [filters, bounds]);

  useEffect(() => {
    if (!facets) return;
    let cancelled = false;
    setIsLoading(true);
    setError(null);
    fetchBooks({ params, limit: filters.limit, surprise: surpriseRound > 0 })
      .then((next) => {
        if (!cancelled) setResults(next);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        if (err instanceof ApiError && err.status === 503) {
          setFatalError(err.message);
        } else {
          setError(err instanceof Error ? err.message : "Error filtering books");
        }
      })
      .finally(() => {
        if (!cancelled) setIsLoading(false);
      });
    return () => {
      cancelled = true;
    };
  }, [facets, params, filters.limit, surpriseRound]);

  const updateFilter = useCallback(<K extends keyof FilterState>(key: K, value: FilterState[K]) => {
    setSurpriseRound(0);
    setFilters((prev) => ({ ...prev, [key]: value }));
  }, []);

  const hint = (field: keyof FilterState) => fieldHint(facets?.dictionary, field);

  const handleReadingListExport = useCallback(() => {
    if (!results || results.items.length === 0) return;
    downloadText(readingListCsv(results.items, results.columns), READING_LIST_FILE_NAME);
  }, [results]);

  if (fatalError) {
    return (
      <main className="rl-app">
        <div className="rl-fatal">
          <h1>Book data is unavailable</h1>
          <p>{fatalError}</p>
          <p>Place the CSV files in the data folder and reload.</p>
        </div>
      </main>
    );
  }

  return (
    <div className="rl-app">
      <aside className="rl-sidebar">
        <h2>Customize your reading list</h2>

        <Section title="Content preferences">
          <label className="rl-field" title={hint("genres")}>
            Preferred genres
            <select
              multiple
              value={filters.genres}
              onChange={(e) => updateFilter("genres", selectedOptions(e))}
            >
              {facets?.genres.map((genre) => (
                <option key={genre} value={genre}>
                  {genre}
                </option>
              ))}
            </select>
          </label>
          <label className="rl-field" title={hint("authors")}>
            Favorite authors (optional)
            <select
              multiple
              value={filters.authors}
              onChange={(e) => updateFilter("authors", selectedOptions(e))}
            >
              {facets?.authors.map((author) => (
                <option key={author} value={author}>
                  {author}
                </option>
              ))}
            </select>
          </label>
        </Section>

        <Section title="Quality & search">
          <label className="rl-field" title={hint("minRating")}>
            Minimum average rating: {filters.minRating.toFixed(1)}
            <input
              type="range"
              min={1}
              max={5}
              step={0.1}
              value={filters.minRating}
              onChange={(e) => updateFilter("minRating", Number(e.target.value))}
            />
          </label>
          <label className="rl-field">
            Number of recommendations: {filters.limit}
            <input
              type="range"
              min={1}
              max={MAX_LIMIT}
              value={filters.limit}
              onChange={(e) => updateFilter("limit", Number(e.target.value))}
            />
          </label>
          <label className="rl-field" title={hint("titleSearch")}>
            Search for a book title (optional)
            <input
              type="text"
              value={filters.titleSearch}
              onChange={(e) => updateFilter("titleSearch", e.target.value)}
            />
          </label>
        </Section>

        <Section title="Review settings">
          <label className="rl-check">
            <input
              type="checkbox"
              checked={reviewSettings.hideSpoilers}
              onChange={(e) => setReviewSettings({ hideSpoilers: e.target.checked })}
            />
            Hide reviews flagged as spoilers
          </label>
          <button
            type="button"
            className="rl-button rl-button-primary"
            onClick={() => setSurpriseRound((round) => round + 1)}
            disabled={!results || results.total === 0}
          >
            Surprise me!
          </button>
        </Section>

        <Section title="Publication era" hint={hint("yearRange")}>
          <div className="rl-presets">
            {ERA_PRESETS.map((preset) => (
              <button
                key={preset.key}
                type="button"
                className={`rl-button ${filters.era === preset.key ? "rl-button-active" : ""}`}
                onClick={() => updateFilter("era", filters.era === preset.key ? null : preset.key)}
              >
                {preset.label}
              </button>
            ))}
          </div>
          {!filters.era && (
            <RangeInputs
              value={filters.yearRange ?? bounds.years}
              bounds={bounds.years}
              onChange={(next) => updateFilter("yearRange", next)}
            />
          )}
        </Section>

        <Section title="Book length" hint={hint("pageRange")}>
          <div className="rl-presets">
            {LENGTH_PRESETS.map((preset) => (
              <button
                key={preset.key}
                type="button"
                className={`rl-button ${filters.length === preset.key ? "rl-button-active" : ""}`}
                onClick={() => updateFilter("length", filters.length === preset.key ? null : preset.key)}
              >
                {preset.label}
              </button>
            ))}
          </div>
          {!filters.length && (
            <RangeInputs
              value={filters.pageRange ?? bounds.pages}
              bounds={bounds.pages}
              onChange={(next) => updateFilter("pageRange", next)}
            />
          )}
        </Section>

        <details className="rl-section">
          <summary className="rl-section-title">Advanced filters</summary>
          <label className="rl-field" title={hint("minRatingsCount")}>
            Minimum number of ratings
            <input
              type="number"
              min={0}
              value={filters.minRatingsCount}
              onChange={(e) => updateFilter("minRatingsCount", Math.max(0, Number(e.target.value) || 0))}
            />
          </label>
          <label className="rl-field">
            Include keyword (title, description or reviews)
            <input type="text" value={filters.keyword} onChange={(e) => updateFilter("keyword", e.target.value)} />
          </label>
          <label className="rl-field">
            Exclude keyword (title/description)
            <input
              type="text"
              value={filters.excludeKeyword}
              onChange={(e) => updateFilter("excludeKeyword", e.target.value)}
            />
          </label>
          <label className="rl-check" title={hint("onlyWithReviews")}>
            <input
              type="checkbox"
              checked={filters.onlyWithReviews}
              onChange={(e) => updateFilter("onlyWithReviews", e.target.checked)}
            />
            Only show books with text reviews
          </label>
        </details>

        <button
          type="button"
          className="rl-button"
          onClick={() => {
            setSurpriseRound(0);
            setFilters(DEFAULT_FILTER_STATE);
            setReviewSettings(DEFAULT_REVIEW_SETTINGS);
          }}
        >
          Reset filters
        </button>
      </aside>

      <main className="rl-main">
        <h1>Reading List Finder</h1>
        <p className="rl-subtitle">Book recommendations from reader ratings and reviews</p>

        {!facets && <p className="rl-muted">Loading book data...</p>}
        {facets && <Metrics stats={facets.stats} />}
        {facets?.reviewsSource === "sample" && (
          <p className="rl-notice">Showing reviews from the sample file; the full reviews file is not available.</p>
        )}

        <h2>Recommended books for you</h2>
        {error && <p className="rl-error">{error}</p>}
        {isLoading && <p className="rl-muted">Filtering books based on your preferences...</p>}

        {results && results.total === 0 && (
          <p className="rl-info">
            No books found matching your preferences. Try adjusting your filters to discover more books!
          </p>
        )}

        {results && results.total > 0 && (
          <>
            <p className="rl-success">
              Found {results.total.toLocaleString()} books matching your criteria.{" "}
              {surpriseRound > 0
                ? `Here are ${results.count} random picks.`
                : `Showing top ${results.count} recommendations.`}
            </p>
            <RatingChart buckets={results.histogram} />

            {results.items.map((work) => (
              <BookCard key={work.id} work={work} hideSpoilers={reviewSettings.hideSpoilers} />
            ))}

            <section className="rl-download">
              <h3>Save your reading list</h3>
              <button type="button" className="rl-button rl-button-primary" onClick={handleReadingListExport}>
                Download as CSV
              </button>
              <a className="rl-link" href={booksCsvUrl({ params })} download>
                Download all {results.total.toLocaleString()} matches
              </a>
            </section>
          </>
        )}
      </main>

      <Analytics />
      <SpeedInsights />
    </div>
  );
}

export default App;
