// Registers the TF.js CPU kernels so tests can build tensors before any backend is chosen.
import "@tensorflow/tfjs-backend-cpu";
