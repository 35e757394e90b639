import { DateTime } from "luxon";
import { ProductDocument, Review, ReviewStats } from "../ProductTypes";

export function computeReviewStats(reviews: readonly Review[]) : ReviewStats
{
    const ratings = reviews
        .map(review => review.rating)
        .filter((rating): rating is number => rating !== undefined);

    const last = reviews.length > 0 ? reviews[reviews.length - 1] : undefined;

    return {
        total_reviews: reviews.length,
        //undefined rather than 0 so "no data" never reads as a zero mark
        mean_mark: ratings.length > 0 ? ratings.reduce((acc, rating) => acc + rating, 0) / ratings.length : undefined,
        //the list order is authoritative, dates are not consulted
        last_rating: last?.rating,
    };
}

export function buildReviewStats(documents: readonly ProductDocument[]) : Map<string, ReviewStats>
{
    const stats = new Map<string, ReviewStats>();
    for (const document of documents)
    {
        stats.set(document.url, computeReviewStats(document.reviews));
    }
    return stats;
}

function toMillis(date: string | undefined) : number | undefined
{
    if (date === undefined) return undefined;
    const parsed = DateTime.fromISO(date);
    return parsed.isValid ? parsed.toMillis() : undefined;
}

//true when some review is dated strictly after the last one in the list
//last_rating keeps the list order either way, this only lets the builder report it
export function isLastReviewOutOfDateOrder(reviews: readonly Review[]) : boolean
{
    if (reviews.length < 2) return false;

    const last = toMillis(reviews[reviews.length - 1].date);
    if (last === undefined) return false;

    return reviews.slice(0, -1).some(review => {
        const millis = toMillis(review.date);
        return millis !== undefined && millis > last;
    });
}
