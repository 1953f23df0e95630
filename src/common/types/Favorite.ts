export default interface Favorite {
  user_id: string;
  listing_id: string;
  created_at: Date;
}
