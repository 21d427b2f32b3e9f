// Importing a source registers its handler
import './foursquare';
import './overpass';
