export function FIRST_ALBUM_TEMPLATE(artist: string): string {
  return `Please provide a list of all songs from ${artist}'s first studio album in the exact order they appear on the album (track listing order).

Return the response in the following JSON format only, with no additional text:
{
    "album_name": "Album Name",
    "songs": ["Song 1", "Song 2", "Song 3"]
}

Important: List the songs in their original album order (track 1, track 2, etc.).`;
}
