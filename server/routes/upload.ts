import express, { Router } from 'express';
import multer from 'multer';
import { config } from '../config.js';
import { uploadFile } from '../controllers/uploadController.js';
import { getFileExtension, SUPPORTED_EXTENSIONS } from '../lib/fileParser.js';

const supported = new Set<string>(SUPPORTED_EXTENSIONS);

// In-memory storage; the whole file is parsed at once
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.MAX_UPLOAD_MB * 1024 * 1024,
  },
  fileFilter: (req: express.Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    if (supported.has(getFileExtension(file.originalname))) {
      cb(null, true);
    } else {
      cb(new Error('Invalid file type. Please upload CSV or Excel files.'));
    }
  },
});

const router = Router();

const handleUploadErrors: express.ErrorRequestHandler = (err, req, res, next) => {
  if (err instanceof multer.MulterError) {
    const message =
      err.code === 'LIMIT_FILE_SIZE'
        ? `File size exceeds the maximum limit of ${config.MAX_UPLOAD_MB}MB.`
        : err.message;
    console.warn(`⚠️ Upload rejected: ${message}`);
    res.status(400).json({ error: message });
    return;
  }
  if (err instanceof Error) {
    console.warn(`⚠️ Upload rejected: ${err.message}`);
    res.status(400).json({ error: err.message });
    return;
  }
  next(err);
};

router.post('/upload', upload.single('file'), handleUploadErrors, uploadFile);

export default router;
