import { ValidationError } from '../domain/errors'

export interface RedditPostRef {
  subreddit: string
  postId: string
  url: string
}

/**
 * Parses links such as https://www.reddit.com/r/SideProject/comments/abc123/my_title/
 * into the subreddit, the post id and a canonical URL (no query, no
 * fragment, no trailing slash, lower-case host).
 */
export function parseRedditUrl(input: string): RedditPostRef {
  let parsed: URL
  try {
    parsed = new URL(input.trim())
  } catch {
    throw new ValidationError(`Not a URL: ${input}`, ['url: invalid URL'])
  }

  const host = parsed.hostname.toLowerCase()
  if (host !== 'reddit.com' && !host.endsWith('.reddit.com')) {
    throw new ValidationError(`Not a Reddit URL: ${input}`, [
      'url: host must be reddit.com',
    ])
  }

  const segments = parsed.pathname.split('/').filter(Boolean)
  const commentsAt = segments.indexOf('comments')
  const subreddit = commentsAt >= 2 ? segments[commentsAt - 1] : undefined
  const postId = segments[commentsAt + 1]
  if (
    commentsAt < 2 ||
    segments[commentsAt - 2] !== 'r' ||
    !subreddit ||
    !postId ||
    !/^[a-z0-9]+$/i.test(postId)
  ) {
    throw new ValidationError(`Cannot find a post id in ${input}`, [
      'url: expected /r/<subreddit>/comments/<id>',
    ])
  }

  const pathname = parsed.pathname.replace(/\/+$/, '')
  return {
    subreddit,
    postId: postId.toLowerCase(),
    url: `${parsed.protocol}//${host}${pathname}`,
  }
}
