/**
 * Build the extraction prompt for one document's OCR text.
 */
export function buildPropertyExtractionPrompt(ocrText: string): string {
  return `Extract structured information from the following Japanese real estate document.

Text content:
${ocrText}

Fields to extract:
1. property_type: Property type (マンション/一戸建て/土地 etc.)
2. property_name: Property name
3. address: Full address including room number
4. prefecture: Prefecture (東京都/大阪府 etc.)
5. city: City/District (渋谷区/大阪市 etc.)
6. land_rights: Land rights (所有権/借地権 etc.)
7. current_status: Current status (空室/居住中 etc.)
8. handover_date: Handover date
9. build_year: Year built (Western calendar, e.g. 2015)
10. structure: Structure (RC造/木造/S造 etc.)
11. total_floors: Total floors
12. floor_number: Floor number
13. room_layout: Room layout (1LDK/2LDK/3LDK etc.)
14. orientation: Orientation (南/北/東/西 etc.)
15. price: Price in 万円 (e.g. 5000)
16. management_fee: Monthly management fee in 円
17. repair_fee: Monthly repair fund in 円
18. exclusive_area: Exclusive area in m²
19. balcony_area: Balcony area in m² (if available)
20. stations: Array of nearest stations reachable on foot. Each object has name (station name), lines (array of line names) and walking_minutes (number).
21. parking: Parking availability
22. pet_policy: Pet policy
23. corner_room: Whether it is a corner room (角部屋); null if not mentioned

Rules:
- Convert units: 畳 → m² (×1.62), 坪 → m² (×3.3).
- Use null for any field that is not found.
- stations: include only walking distances (徒歩〇分, 歩〇分). Skip 直通, 乗換, バス and other transport.
- When one station is served by several lines, return ONE object with all lines, e.g. {"name": "渋谷", "lines": ["山手線", "銀座線", "半蔵門線"], "walking_minutes": 5}. Never repeat a station.
- Return ONLY a JSON object, no other text.

Example response:
{
  "property_type": "マンション",
  "property_name": "〇〇コーポ",
  "address": "東京都渋谷区円山町28-14 305",
  "price": 5800,
  "exclusive_area": 65.8,
  "room_layout": "2LDK",
  "build_year": 2018,
  "stations": [
    {"name": "渋谷", "lines": ["山手線", "銀座線"], "walking_minutes": 5},
    {"name": "表参道", "lines": ["千代田線"], "walking_minutes": 8}
  ],
  "parking": "空無 (月額23,000円/台)"
}`;
}
